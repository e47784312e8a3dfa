import type { ScoringMode } from './scoring';

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';
export type ReadinessLevel = 'ADVANCED' | 'DEVELOPING' | 'BASIC';
export type ClassificationLevel = RiskLevel | ReadinessLevel;

// Polarity-free bucket, so consumers do not care whether higher means better or worse.
export type Severity = 'best' | 'middle' | 'worst';

export interface Classification {
  level: ClassificationLevel;
  severity: Severity;
}

export interface LevelPresentation {
  title: string;
  color: string;
}

export interface ScoringPolicy {
  mode: ScoringMode;
  scoreLabel: string;
  levelLabel: string;
  classify: (percentage: number) => Classification;
  classifyCategory: (percentage: number) => Classification;
  presentation: Record<Severity, LevelPresentation>;
}

const SEVERITY_COLORS: Record<Severity, string> = {
  best: '#10b981',
  middle: '#f59e0b',
  worst: '#ef4444'
};

// Higher percentage = more risk; the "better" side of each breakpoint is inclusive.
const riskScheme = (lowMax: number, mediumMax: number) => (percentage: number): Classification => {
  if (percentage <= lowMax) return { level: 'LOW', severity: 'best' };
  if (percentage <= mediumMax) return { level: 'MEDIUM', severity: 'middle' };
  return { level: 'HIGH', severity: 'worst' };
};

// Higher percentage = more mature practice.
const readinessScheme = (advancedMin: number, developingMin: number) => (percentage: number): Classification => {
  if (percentage >= advancedMin) return { level: 'ADVANCED', severity: 'best' };
  if (percentage >= developingMin) return { level: 'DEVELOPING', severity: 'middle' };
  return { level: 'BASIC', severity: 'worst' };
};

export const RISK_POLICY: ScoringPolicy = {
  mode: 'risk',
  scoreLabel: 'Risk Score',
  levelLabel: 'Overall Risk Level',
  classify: riskScheme(25, 60),
  // Category averages: <= 0.5 low, <= 1.5 medium (of a 0-2 scale)
  classifyCategory: riskScheme(25, 75),
  presentation: {
    best: { title: 'Low', color: SEVERITY_COLORS.best },
    middle: { title: 'Medium', color: SEVERITY_COLORS.middle },
    worst: { title: 'High', color: SEVERITY_COLORS.worst }
  }
};

export const READINESS_POLICY: ScoringPolicy = {
  mode: 'readiness',
  scoreLabel: 'Readiness Score',
  levelLabel: 'AI Development Readiness Level',
  classify: readinessScheme(75, 50),
  classifyCategory: readinessScheme(75, 50),
  presentation: {
    best: { title: 'Advanced', color: SEVERITY_COLORS.best },
    middle: { title: 'Developing', color: SEVERITY_COLORS.middle },
    worst: { title: 'Basic', color: SEVERITY_COLORS.worst }
  }
};

export const SCORING_POLICIES: Record<ScoringMode, ScoringPolicy> = {
  risk: RISK_POLICY,
  readiness: READINESS_POLICY
};

export const getScoringPolicy = (mode: ScoringMode): ScoringPolicy => SCORING_POLICIES[mode];

export const classify = (percentage: number, mode: ScoringMode): ClassificationLevel =>
  getScoringPolicy(mode).classify(percentage).level;
