import { Annotation } from "@langchain/langgraph";
import type { ChatTurn } from "@careline/shared";
import type {
    AttachmentRef,
    ErrorKind,
    ImageFinding,
    InputKind,
    RetrievalContext,
    StageName,
    ToolName
} from "../types/Workflow.js";

const lastValue = <T>(_: T, update: T): T => update;

export const ConversationState = Annotation.Root({
    patientId:          Annotation<string>({ reducer: lastValue, default: () => '' }),
    sessionId:          Annotation<string>({ reducer: lastValue, default: () => '' }),
    messageHistory:     Annotation<ChatTurn[]>({ reducer: lastValue, default: () => [] }),

    // First write wins: the classifier decides once per turn.
    inputKind:          Annotation<InputKind | null>({ reducer: (current, update) => current ?? update, default: () => null }),
    rawText:            Annotation<string>({ reducer: lastValue, default: () => '' }),
    audioRef:           Annotation<AttachmentRef | null>({ reducer: lastValue, default: () => null }),
    imageRef:           Annotation<AttachmentRef | null>({ reducer: lastValue, default: () => null }),

    transcript:         Annotation<string>({ reducer: lastValue, default: () => '' }),
    imageFinding:       Annotation<ImageFinding | null>({ reducer: lastValue, default: () => null }),
    retrievalContext:   Annotation<RetrievalContext | null>({ reducer: lastValue, default: () => null }),

    // Once requested, a retrieval request cannot be withdrawn or re-issued.
    retrievalRequested: Annotation<boolean>({ reducer: (current, update) => current || update, default: () => false }),
    retrievalCount:     Annotation<number>({ reducer: (current, update) => current + update, default: () => 0 }),

    nextStage:          Annotation<StageName | null>({ reducer: lastValue, default: () => null }),
    currentStage:       Annotation<StageName | null>({ reducer: lastValue, default: () => null }),

    draftResponse:      Annotation<string>({ reducer: lastValue, default: () => '' }),
    finalResponse:      Annotation<string | null>({ reducer: (current, update) => current ?? update, default: () => null }),

    emergencyFlag:      Annotation<boolean>({ reducer: (current, update) => current || update, default: () => false }),
    safetyPassed:       Annotation<boolean>({ reducer: lastValue, default: () => false }),
    errorKind:          Annotation<ErrorKind | null>({ reducer: (current, update) => current ?? update, default: () => null }),

    stepCount:          Annotation<number>({ reducer: (current, update) => current + update, default: () => 0 }),
    visitedStages:      Annotation<StageName[]>({ reducer: (current, update) => current.concat(update), default: () => [] }),
    toolsUsed:          Annotation<ToolName[]>({
        reducer: (current, update) => current.concat(update.filter(tool => !current.includes(tool))),
        default: () => []
    }),
});

export type ConversationStateType = typeof ConversationState.State;
export type ConversationUpdate = typeof ConversationState.Update;
