import type { ConversationStateType, ConversationUpdate } from '../states/ConversationState.js';
import type { ErrorKind } from '../types/Workflow.js';

export interface Stage {
    run(state: ConversationStateType): Promise<ConversationUpdate> | ConversationUpdate;
}

export function failWith(errorKind: ErrorKind): ConversationUpdate {
    return { errorKind, nextStage: 'handle_error' };
}
