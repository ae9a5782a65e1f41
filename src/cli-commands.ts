// src/cli-commands.ts

import { REQUESTED_AGENTS, RequestedAgent } from './models/agent.model';
import { MODEL_CHOICES, ModelChoice, isModelChoice } from './services/llm/models';

export type CliCommand =
    | { kind: 'query'; text: string }
    | { kind: 'new' }
    | { kind: 'history' }
    | { kind: 'clear' }
    | { kind: 'agent'; agent: RequestedAgent }
    | { kind: 'model'; model: ModelChoice }
    | { kind: 'exit' }
    | { kind: 'empty' }
    | { kind: 'invalid'; message: string };

export const CLI_HELP = [
    '/new              start a new session',
    '/history          show this session\'s history',
    '/clear            clear this session',
    `/agent <id|auto>  pin an agent (${REQUESTED_AGENTS.join(', ')})`,
    `/model <id>       choose the model (${MODEL_CHOICES.join(', ')})`,
    '/exit             quit',
].join('\n');

const isRequestedAgent = (value: string): value is RequestedAgent => REQUESTED_AGENTS.some((agent) => agent === value);

export function parseCliInput(line: string): CliCommand {
    const input = line.trim();
    if (!input) return { kind: 'empty' };
    if (!input.startsWith('/')) return { kind: 'query', text: input };

    const [command, ...rest] = input.split(/\s+/);
    const argument = rest.join(' ');

    switch (command.toLowerCase()) {
        case '/new':
            return { kind: 'new' };
        case '/history':
            return { kind: 'history' };
        case '/clear':
            return { kind: 'clear' };
        case '/exit':
            return { kind: 'exit' };
        case '/agent':
            return isRequestedAgent(argument)
                ? { kind: 'agent', agent: argument }
                : { kind: 'invalid', message: `Unknown agent '${argument}'. Choose one of: ${REQUESTED_AGENTS.join(', ')}` };
        case '/model':
            return isModelChoice(argument)
                ? { kind: 'model', model: argument }
                : { kind: 'invalid', message: `Unknown model '${argument}'. Choose one of: ${MODEL_CHOICES.join(', ')}` };
        default:
            return { kind: 'invalid', message: `Unknown command ${command}\n${CLI_HELP}` };
    }
}
