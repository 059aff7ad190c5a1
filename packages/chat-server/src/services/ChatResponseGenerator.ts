import type { ChatOpenAI } from '@langchain/openai';
import { AIMessage, HumanMessage, SystemMessage, type BaseMessage, type MessageContent } from '@langchain/core/messages';
import type { ChatTurn } from '@careline/shared';
import type { ContextBundle, ResponseGenerator } from '../types/Workflow.js';
import { renderContext } from './PromptBuilder.js';

export function contentToText(content: MessageContent): string {
    if (typeof content === 'string') {
        return content;
    }
    return content
        .map(part => ('text' in part && typeof part.text === 'string') ? part.text : '')
        .join('');
}

export class ChatResponseGenerator implements ResponseGenerator {
    constructor(private llm: ChatOpenAI) {}

    buildMessages(systemPrompt: string, context: ContextBundle, history: ChatTurn[]): BaseMessage[] {
        const contextSection = renderContext(context);
        const systemText = contextSection ? `${systemPrompt}\n\n${contextSection}` : systemPrompt;

        return [
            new SystemMessage(systemText),
            ...history.map(turn => turn.role === 'assistant' ? new AIMessage(turn.text) : new HumanMessage(turn.text)),
            new HumanMessage(context.query)
        ];
    }

    async generate(systemPrompt: string, context: ContextBundle, history: ChatTurn[]): Promise<string> {
        const messages = this.buildMessages(systemPrompt, context, history);
        const response = await this.llm.invoke(messages);
        const text = contentToText(response.content);

        console.log('[ChatResponseGenerator] Generated response:', {
            historyLength: history.length,
            hasRetrieval: context.retrievalContext !== null,
            hasImageFinding: context.imageFinding !== null,
            responseLength: text.length
        });

        return text;
    }
}
