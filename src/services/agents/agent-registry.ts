// src/services/agents/agent-registry.ts

import { AgentId, AgentProfile, SPECIALIST_AGENT_IDS, SpecialistAgentId } from '../../models/agent.model';
import {
  GENERAL_PROMPT_TEMPLATE,
  INCIDENT_RESPONSE_PROMPT_TEMPLATE,
  PREVENTION_PROMPT_TEMPLATE,
  THREAT_INTELLIGENCE_PROMPT_TEMPLATE,
} from './prompts/specialistPrompts';

const CURRENT_EVENT_KEYWORDS = ['latest', 'recent', 'new', 'emerging', 'current', 'today', 'now'];

/** Routing priority, highest first; breaks ties between equal confidences. */
export const AGENT_PRIORITY: readonly SpecialistAgentId[] = SPECIALIST_AGENT_IDS;

const profiles: Record<AgentId, AgentProfile> = {
  incident_response: {
    agentId: 'incident_response',
    displayName: 'Incident Response Specialist',
    knowledgeFilter: { partitions: ['incident_response', 'shared'] },
    systemPromptTemplate: INCIDENT_RESPONSE_PROMPT_TEMPLATE,
    webSearchKeywords: [
      ...CURRENT_EVENT_KEYWORDS,
      'zero-day', 'zero day', '0day', 'exploit', 'vulnerability', 'cve',
      'ransomware', 'malware', 'breach', 'attack', 'incident', 'alert',
    ],
    webQueryPrefix: 'cybersecurity incident response',
  },
  threat_intelligence: {
    agentId: 'threat_intelligence',
    displayName: 'Threat Intelligence Analyst',
    knowledgeFilter: { partitions: ['threat_intelligence', 'shared'] },
    systemPromptTemplate: THREAT_INTELLIGENCE_PROMPT_TEMPLATE,
    webSearchKeywords: [
      ...CURRENT_EVENT_KEYWORDS,
      'apt', 'threat actor', 'group', 'campaign', 'ioc', 'ttp', 'tactic',
      'technique', 'procedure', 'malware', 'ransomware', 'exploit',
    ],
    webQueryPrefix: 'threat intelligence IOC analysis',
  },
  prevention: {
    agentId: 'prevention',
    displayName: 'Security Prevention Expert',
    knowledgeFilter: { partitions: ['prevention', 'shared'] },
    systemPromptTemplate: PREVENTION_PROMPT_TEMPLATE,
    webSearchKeywords: [
      ...CURRENT_EVENT_KEYWORDS,
      'framework', 'standard', 'policy', 'guideline', 'best practice',
      'security control', 'architecture', 'design', 'mitigation',
    ],
    webQueryPrefix: 'cybersecurity framework prevention',
  },
  general: {
    agentId: 'general',
    displayName: 'General Cybersecurity Expert',
    knowledgeFilter: { partitions: ['shared'] },
    systemPromptTemplate: GENERAL_PROMPT_TEMPLATE,
    webSearchKeywords: CURRENT_EVENT_KEYWORDS,
    webQueryPrefix: 'cybersecurity',
  },
};

function deepFreeze(profile: AgentProfile): Readonly<AgentProfile> {
  Object.freeze(profile.knowledgeFilter.partitions);
  Object.freeze(profile.knowledgeFilter);
  Object.freeze(profile.webSearchKeywords);
  return Object.freeze(profile);
}

/**
 * Immutable registry of agent profiles, resolved at startup.
 */
export const AGENT_PROFILES: Readonly<Record<AgentId, Readonly<AgentProfile>>> = Object.freeze({
  incident_response: deepFreeze(profiles.incident_response),
  threat_intelligence: deepFreeze(profiles.threat_intelligence),
  prevention: deepFreeze(profiles.prevention),
  general: deepFreeze(profiles.general),
});

export const ALL_AGENT_IDS: readonly AgentId[] = Object.freeze([...SPECIALIST_AGENT_IDS, 'general'] as const);

export function getAgentProfile(agentId: AgentId): Readonly<AgentProfile> {
  return AGENT_PROFILES[agentId];
}

export function isAgentId(value: string): value is AgentId {
  return ALL_AGENT_IDS.some((agentId) => agentId === value);
}
