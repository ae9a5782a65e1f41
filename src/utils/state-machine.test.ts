import { describe, expect, it } from 'vitest';
import { InvalidTransitionError, StateMachine, TransitionTable } from './state-machine';

type Light = 'red' | 'green' | 'amber';

const TABLE: TransitionTable<Light> = { red: ['green'], green: ['amber'], amber: ['red'] };

describe('StateMachine', () => {
    it('follows legal transitions and records the path', () => {
        const seen: string[] = [];
        const fsm = new StateMachine(TABLE, 'red', (from, to) => seen.push(`${from}->${to}`));

        fsm.transition('green');
        fsm.transition('amber');

        expect(fsm.state).toBe('amber');
        expect(fsm.path).toEqual(['red', 'green', 'amber']);
        expect(seen).toEqual(['red->green', 'green->amber']);
    });

    it('refuses an illegal transition and stays put', () => {
        const fsm = new StateMachine(TABLE, 'red');

        expect(fsm.can('amber')).toBe(false);
        expect(() => fsm.transition('amber')).toThrow(InvalidTransitionError);
        expect(fsm.state).toBe('red');
    });
});
