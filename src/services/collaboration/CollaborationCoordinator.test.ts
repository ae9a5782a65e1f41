import { describe, expect, it } from 'vitest';
import { AgentCandidate, AgentId } from '../../models/agent.model';
import { FakeAgent, FakeModelInvoker, fixedAgents, makeAnswer, silentLogger } from '../../testing/fakes';
import { ModelInvoker } from '../llm/types';
import { RoutingDecision } from '../router.service';
import {
    CollaborationCoordinator,
    CollaborationInput,
    CollaborationState,
    describeRouting,
    mergeAnswers,
} from './CollaborationCoordinator';

function coordinatorWith(agents: Map<AgentId, FakeAgent>, timeoutMs = 1000, models: ModelInvoker | null = null) {
    return new CollaborationCoordinator({ logger: silentLogger, agents, models, threshold: 0.6, timeoutMs });
}

const only = (agentId: AgentId, routingConfidence = 1): AgentCandidate[] => [{ agentId, routingConfidence }];

function input(
    primaryConfidence: number,
    candidates: AgentCandidate[] = only('incident_response'),
    routing: Partial<RoutingDecision> = {},
): CollaborationInput {
    return {
        query: 'Ransomware encrypted our file shares',
        history: [],
        modelChoice: 'openai_mini',
        primary: makeAnswer('incident_response', primaryConfidence),
        routing: { candidates, method: 'keyword', followUp: false, collaborationMode: 'consultation', ...routing },
    };
}

describe('CollaborationCoordinator', () => {
    it('keeps a confident primary answer without consulting anyone', async () => {
        const agents = fixedAgents({});
        const outcome = await coordinatorWith(agents).coordinate(input(0.8));

        expect(outcome.collaboration.mode).toBe('single_agent');
        expect(outcome.collaboration.consultingAgents).toEqual([]);
        expect(outcome.answer.response).toBe('incident_response answer');
        expect(outcome.path).toEqual(['single_agent', 'merged']);
        expect(outcome.collaboration.thoughtProcess).toEqual([
            'Routed to incident_response (keyword, 1.00).',
            'Primary agent incident_response answered with confidence 0.80.',
            'Confidence meets threshold 0.6; no collaboration needed.',
        ]);
        for (const agent of agents.values()) {
            expect(agent.inputs).toHaveLength(0);
        }
    });

    it('does not collaborate when confidence equals the threshold', async () => {
        const outcome = await coordinatorWith(fixedAgents({})).coordinate(input(0.6));

        expect(outcome.collaboration.mode).toBe('single_agent');
    });

    it('promotes a more confident consulting answer and keeps the primary as a note', async () => {
        const agents = fixedAgents({ threat_intelligence: 0.9, prevention: 0.5 });
        const transitions: Array<[CollaborationState, CollaborationState]> = [];

        const outcome = await coordinatorWith(agents).coordinate({
            ...input(0.4),
            onTransition: (from, to) => transitions.push([from, to]),
        });

        expect(outcome.collaboration.mode).toBe('consultation');
        expect(outcome.collaboration.primaryAgent).toBe('incident_response');
        expect(outcome.collaboration.consultingAgents).toEqual(['threat_intelligence', 'prevention']);
        expect(outcome.answer.agentId).toBe('threat_intelligence');
        expect(outcome.answer.confidenceScore).toBe(0.9);
        expect(outcome.answer.response.startsWith('threat_intelligence answer')).toBe(true);
        expect(outcome.answer.response).toContain('**Supporting note from Incident Response Specialist** (confidence 0.40):\nincident_response answer');
        expect(outcome.path).toEqual(['single_agent', 'collaboration_pending', 'collaboration_active', 'merged']);
        expect(transitions).toEqual([
            ['single_agent', 'collaboration_pending'],
            ['collaboration_pending', 'collaboration_active'],
            ['collaboration_active', 'merged'],
        ]);
        expect(agents.get('threat_intelligence')?.inputs[0].query).toBe('Ransomware encrypted our file shares');
    });

    it('keeps the primary answer when no consultant is more confident', async () => {
        const outcome = await coordinatorWith(fixedAgents({ threat_intelligence: 0.5, prevention: 0.3 })).coordinate(input(0.5));

        expect(outcome.answer.agentId).toBe('incident_response');
        expect(outcome.answer.confidenceScore).toBe(0.5);
        expect(outcome.answer.response).toBe([
            'incident_response answer',
            '**Supporting note from Threat Intelligence Analyst** (confidence 0.50):\nthreat_intelligence answer',
            '**Supporting note from Security Prevention Expert** (confidence 0.30):\nprevention answer',
        ].join('\n\n---\n\n'));
        expect(outcome.collaboration.thoughtProcess[outcome.collaboration.thoughtProcess.length - 1])
            .toBe('Primary answer kept; consulting answers appended as supporting notes.');
    });

    it('consults the remaining router candidates when there are any', async () => {
        const agents = fixedAgents({ prevention: 0.4 });
        const candidates: AgentCandidate[] = [
            { agentId: 'incident_response', routingConfidence: 0.6 },
            { agentId: 'prevention', routingConfidence: 0.4 },
        ];

        const outcome = await coordinatorWith(agents).coordinate(input(0.3, candidates));

        expect(outcome.collaboration.consultingAgents).toEqual(['prevention']);
        expect(agents.get('threat_intelligence')?.inputs).toHaveLength(0);
    });

    it('falls back to the primary answer when consultation times out', async () => {
        const agents = fixedAgents({});
        agents.set('threat_intelligence', new FakeAgent('threat_intelligence', () => new Promise(() => undefined)));
        agents.set('prevention', new FakeAgent('prevention', () => new Promise(() => undefined)));

        const outcome = await coordinatorWith(agents, 20).coordinate(input(0.2));

        expect(outcome.timedOut).toBe(true);
        expect(outcome.answer.response).toBe('incident_response answer');
        expect(outcome.collaboration.thoughtProcess).toContain('Consultation exceeded 20ms; keeping primary answer.');
        expect(outcome.path[outcome.path.length - 1]).toBe('merged');
    });

    it('ignores a consultant that fails', async () => {
        const agents = fixedAgents({ prevention: 0.7 });
        agents.set('threat_intelligence', new FakeAgent('threat_intelligence', () => Promise.reject(new Error('boom'))));

        const outcome = await coordinatorWith(agents).coordinate(input(0.3));

        expect(outcome.consulted.map((answer) => answer.agentId)).toEqual(['prevention']);
        expect(outcome.answer.agentId).toBe('prevention');
        expect(outcome.collaboration.thoughtProcess).toContain('threat_intelligence failed: boom.');
    });

    it('says so when no consulting answer was usable', async () => {
        const agents = fixedAgents({});
        agents.set('threat_intelligence', new FakeAgent('threat_intelligence', () => makeAnswer('threat_intelligence', 0, { degraded: true })));
        agents.set('prevention', new FakeAgent('prevention', () => makeAnswer('prevention', 0, { degraded: true })));

        const outcome = await coordinatorWith(agents).coordinate(input(0.3));
        const trace = outcome.collaboration.thoughtProcess;

        expect(outcome.answer.response).toBe('incident_response answer');
        expect(trace[trace.length - 1]).toBe('No usable consulting answers; keeping primary answer.');
        expect(trace).not.toContain('Primary answer kept; consulting answers appended as supporting notes.');
    });

    it('synthesizes multi-perspective answers with one model call led by the most confident answer', async () => {
        const models = new FakeModelInvoker(() => '  Combined answer.  ');
        const agents = fixedAgents({ threat_intelligence: 0.9, prevention: 0.5 });

        const outcome = await coordinatorWith(agents, 1000, models)
            .coordinate(input(0.4, only('incident_response'), { collaborationMode: 'multi_perspective' }));

        expect(models.calls).toHaveLength(1);
        expect(models.calls[0].messages[1].content).toBe([
            'Question: Ransomware encrypted our file shares',
            '### Threat Intelligence Analyst (confidence 0.90)\nthreat_intelligence answer',
            '### Incident Response Specialist (confidence 0.40)\nincident_response answer',
            '### Security Prevention Expert (confidence 0.50)\nprevention answer',
        ].join('\n\n'));
        expect(outcome.answer.response).toBe('Combined answer.');
        expect(outcome.answer.agentId).toBe('threat_intelligence');
        expect(outcome.answer.confidenceScore).toBe(0.9);
        expect(outcome.collaboration.mode).toBe('multi_perspective');
        expect(outcome.collaboration.thoughtProcess).toContain('Synthesized 3 perspectives into one answer led by threat_intelligence.');
    });

    it('falls back to notes when the synthesis call fails', async () => {
        const models = new FakeModelInvoker(() => {
            throw new Error('down');
        });

        const outcome = await coordinatorWith(fixedAgents({ threat_intelligence: 0.5, prevention: 0.3 }), 1000, models)
            .coordinate(input(0.5, only('incident_response'), { collaborationMode: 'multi_perspective' }));

        expect(outcome.answer.response.startsWith('incident_response answer\n\n---\n\n**Supporting note from')).toBe(true);
        expect(outcome.collaboration.thoughtProcess).toContain('Synthesis failed (down); answers merged as notes.');
    });

    it('merges consultation answers as notes without a model call', async () => {
        const models = new FakeModelInvoker(() => 'unused');

        await coordinatorWith(fixedAgents({ threat_intelligence: 0.9 }), 1000, models).coordinate(input(0.4));

        expect(models.calls).toHaveLength(0);
    });

    it('consults every specialist when the generalist answered', async () => {
        const coordinator = coordinatorWith(fixedAgents({}));

        expect(coordinator.consultingAgentsFor('general', only('general', 0.2))).toEqual([
            'incident_response',
            'threat_intelligence',
            'prevention',
        ]);
    });
});

describe('mergeAnswers', () => {
    it('ignores degraded consulting answers', () => {
        const primary = makeAnswer('incident_response', 0.3);
        const degraded = makeAnswer('prevention', 0, { degraded: true });

        expect(mergeAnswers(primary, [degraded])).toEqual({ answer: primary, promoted: null });
    });
});

describe('describeRouting', () => {
    it('lists the other candidates of a classified query', () => {
        expect(describeRouting({
            candidates: [
                { agentId: 'incident_response', routingConfidence: 0.6 },
                { agentId: 'prevention', routingConfidence: 0.4 },
            ],
            method: 'model',
            followUp: false,
            collaborationMode: 'multi_perspective',
        })).toBe('Routed to incident_response (model, 0.60); other candidates prevention 0.40.');
    });

    it('marks an inherited follow-up', () => {
        expect(describeRouting({
            candidates: [{ agentId: 'threat_intelligence', routingConfidence: 1 }],
            method: 'follow_up',
            followUp: true,
            collaborationMode: 'consultation',
        })).toBe('Routed to threat_intelligence (follow_up, 1.00), inherited as a follow-up of the previous answer.');
    });
});
