// src/services/session/ConversationSummarizer.ts

import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { QueryTurn } from '../../models/session.model';
import { WorkflowAborted, errorMessage } from '../../errors';
import { ModelChoice } from '../llm/models';
import { ModelInvoker } from '../llm/types';

export interface SummarizerOptions extends ServiceConfig {
    models: ModelInvoker | null;
    summaryModel: ModelChoice;
}

const SUMMARY_SYSTEM_PROMPT = `Summarize the following cybersecurity advisory conversation in at most 150 words.
Keep concrete facts the user shared (systems, incidents, indicators, constraints) and the advice already given.
Write plain prose without headings.`;

const EXTRACT_CHARS = 160;

function firstSentence(text: string): string {
    const flat = text.replace(/\s+/g, ' ').trim();
    const end = flat.search(/[.!?](\s|$)/);
    const sentence = end === -1 ? flat : flat.slice(0, end + 1);
    return sentence.length > EXTRACT_CHARS ? `${sentence.slice(0, EXTRACT_CHARS - 3)}...` : sentence;
}

/**
 * One line per turn holding its first sentence. Used when the model is unavailable.
 */
export function extractiveSummary(turns: QueryTurn[]): string {
    return turns
        .map((turn) => (turn.summary ? turn.content : `${turn.role === 'user' ? 'User' : 'Advisor'}: ${firstSentence(turn.content)}`))
        .join('\n');
}

export class ConversationSummarizer extends BaseService {
    constructor(private readonly options: SummarizerOptions) {
        super(options);
    }

    public async summarize(turns: QueryTurn[], signal?: AbortSignal): Promise<string> {
        const { models } = this.options;
        if (!models) return extractiveSummary(turns);

        const transcript = turns.map((turn) => `${turn.role}: ${turn.content}`).join('\n\n');
        try {
            const completion = await models.complete(
                this.options.summaryModel,
                [
                    { role: 'system', content: SUMMARY_SYSTEM_PROMPT },
                    { role: 'user', content: transcript },
                ],
                { temperature: 0.2, maxTokens: 400, signal },
            );
            const text = completion.text.trim();
            if (text) return text;
            this.logger.warn('Summary model returned empty text, using extractive summary');
        } catch (error) {
            if (error instanceof WorkflowAborted) throw error;
            this.logger.warn('Summary model failed, using extractive summary', { error: errorMessage(error) });
        }
        return extractiveSummary(turns);
    }
}
