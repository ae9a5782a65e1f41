import { describe, expect, it } from 'vitest';
import { ModelFailure, WorkflowAborted } from '../../errors';
import { silentLogger } from '../../testing/fakes';
import { ModelChoice } from './models';
import { ModelRegistry } from './ModelRegistry';
import { ChatMessage, CompletionOptions, CompletionResult, ModelClient } from './types';

class ScriptedClient implements ModelClient {
    public attempts = 0;

    constructor(
        public readonly choice: ModelChoice,
        private readonly script: Array<(options: CompletionOptions) => Promise<CompletionResult>>,
    ) {}

    public complete(_messages: ChatMessage[], options: CompletionOptions = {}): Promise<CompletionResult> {
        const step = this.script[Math.min(this.attempts, this.script.length - 1)];
        this.attempts++;
        return step(options);
    }
}

const ok = (text: string) => async (): Promise<CompletionResult> => ({ text, model: 'gpt-4o-mini' });
const fail = (message: string) => async (): Promise<CompletionResult> => {
    throw new Error(message);
};
const hang = () => (): Promise<CompletionResult> => new Promise(() => undefined);

const messages: ChatMessage[] = [{ role: 'user', content: 'hello' }];

function registryWith(...clients: ModelClient[]): ModelRegistry {
    return new ModelRegistry({ logger: silentLogger, clients, defaultModel: 'openai_mini', timeoutMs: 20 });
}

describe('ModelRegistry', () => {
    it('returns the first successful completion', async () => {
        const client = new ScriptedClient('openai_mini', [ok('hi')]);

        expect(await registryWith(client).complete('openai_mini', messages)).toEqual({ text: 'hi', model: 'gpt-4o-mini' });
        expect(client.attempts).toBe(1);
    });

    it('retries once after a failure', async () => {
        const client = new ScriptedClient('openai_mini', [fail('rate limited'), ok('second try')]);

        expect((await registryWith(client).complete('openai_mini', messages)).text).toBe('second try');
        expect(client.attempts).toBe(2);
    });

    it('gives up with a ModelFailure after the retry', async () => {
        const client = new ScriptedClient('openai_mini', [fail('down')]);

        await expect(registryWith(client).complete('openai_mini', messages))
            .rejects.toThrow(new ModelFailure("Model 'openai_mini' failed after 2 attempts: down"));
        expect(client.attempts).toBe(2);
    });

    it('times out a call that never answers', async () => {
        const client = new ScriptedClient('openai_mini', [hang()]);

        await expect(registryWith(client).complete('openai_mini', messages)).rejects.toBeInstanceOf(ModelFailure);
        expect(client.attempts).toBe(2);
    });

    it('does not retry an aborted call', async () => {
        const client = new ScriptedClient('openai_mini', [hang()]);
        const controller = new AbortController();
        controller.abort();

        await expect(registryWith(client).complete('openai_mini', messages, { signal: controller.signal }))
            .rejects.toBeInstanceOf(WorkflowAborted);
        expect(client.attempts).toBe(0);
    });

    it('routes unknown choices to the default client', async () => {
        const fallback = new ScriptedClient('openai_mini', [ok('default')]);
        const registry = registryWith(fallback);

        expect(registry.has('groq_llama')).toBe(false);
        expect((await registry.complete('groq_llama', messages)).text).toBe('default');
    });

    it('requires a client for the default model', () => {
        expect(() => registryWith(new ScriptedClient('groq_llama', [ok('x')]))).toThrow("Default model 'openai_mini' has no client");
    });
});
