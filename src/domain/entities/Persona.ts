import type { BehaviorSignals } from './BehaviorSignals.js';

// Priority order: earlier entries win.
export const PERSONA_TYPES = [
  'high_utilization',
  'variable_income',
  'debt_consolidator',
  'subscription_heavy',
  'savings_builder',
  'balanced',
] as const;

export type PersonaType = (typeof PERSONA_TYPES)[number];

export type EvidenceValue = number | string | boolean;

export interface PersonaAssignment {
  userId: string;
  personaType: PersonaType;
  confidence: number;
  evidence: Record<string, EvidenceValue>;
  windowDays: number;
  assignedAt: string;
}

export interface PersonaEvaluation {
  persona: PersonaType;
  matched: boolean;
}

export interface PersonaClassification {
  personaType: PersonaType;
  confidence: number;
  criteria: string;
  evidence: Record<string, EvidenceValue>;
  evaluated: PersonaEvaluation[];
}

export interface PersonaRule {
  persona: PersonaType;
  baseConfidence: number;
  band: { min: number; max: number };
  criteria: string;
  matches: (signals: BehaviorSignals) => boolean;
  adjust: (signals: BehaviorSignals) => number;
  evidence: (signals: BehaviorSignals) => Record<string, EvidenceValue>;
}
