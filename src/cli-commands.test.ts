import { describe, expect, it } from 'vitest';
import { CLI_HELP, parseCliInput } from './cli-commands';

describe('parseCliInput', () => {
    it('treats plain text as a query', () => {
        expect(parseCliInput('  What is EDR?  ')).toEqual({ kind: 'query', text: 'What is EDR?' });
    });

    it('ignores blank lines', () => {
        expect(parseCliInput('   ')).toEqual({ kind: 'empty' });
    });

    it('recognises session commands regardless of case', () => {
        expect(parseCliInput('/new')).toEqual({ kind: 'new' });
        expect(parseCliInput('/HISTORY')).toEqual({ kind: 'history' });
        expect(parseCliInput('/clear')).toEqual({ kind: 'clear' });
        expect(parseCliInput('/exit')).toEqual({ kind: 'exit' });
    });

    it('pins an agent', () => {
        expect(parseCliInput('/agent prevention')).toEqual({ kind: 'agent', agent: 'prevention' });
        expect(parseCliInput('/agent auto')).toEqual({ kind: 'agent', agent: 'auto' });
    });

    it('rejects an unknown agent', () => {
        expect(parseCliInput('/agent general')).toEqual({
            kind: 'invalid',
            message: "Unknown agent 'general'. Choose one of: auto, incident_response, threat_intelligence, prevention",
        });
    });

    it('selects a model', () => {
        expect(parseCliInput('/model groq_llama')).toEqual({ kind: 'model', model: 'groq_llama' });
        expect(parseCliInput('/model gpt-2').kind).toBe('invalid');
    });

    it('shows help for unknown commands', () => {
        expect(parseCliInput('/frobnicate')).toEqual({ kind: 'invalid', message: `Unknown command /frobnicate\n${CLI_HELP}` });
    });
});
