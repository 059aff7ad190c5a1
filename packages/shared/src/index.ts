export { OpenAIClient, type OpenAIConfigs } from './clients/OpenAIClient.js';
export { RedisClient } from './clients/RedisClient.js';
export {
    VectorStoreClient,
    type VectorStoreConfigs,
    type PatientRecord,
    type RecordMatch
} from './clients/VectorStoreClient.js';
export {
    ImageClassifierClient,
    type ImageClassifierConfig,
    type ClassifierPrediction
} from './clients/ImageClassifierClient.js';
export {
    RedisSessionStore,
    type CappedListClient,
    type RedisSessionStoreOptions
} from './stores/RedisSessionStore.js';
export { InMemorySessionStore } from './stores/InMemorySessionStore.js';
export { ChatTurnSchema, type ChatTurn, type ChatRole, type SessionStore } from './types/conversation.js';
export { HistoryWindow } from './utils/HistoryWindow.js';
export { withTimeout, CollaboratorTimeoutError } from './utils/timeout.js';
