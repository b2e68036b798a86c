import { z } from 'zod';

// ===== Configuration =====

export const BenchConfigSchema = z.object({
  bench: z.object({
    durationMs: z.number().int().positive().default(60_000),
    preTestOnly: z.boolean().default(false),
    escalationDisabled: z.boolean().default(false),
    jobId: z.string().optional(),
  }).default({}),
  target: z.object({
    remotes: z.array(z.string().min(1)).min(1).default(['localhost:8080']),
    userAgent: z.string().default('surgebench'),
    initializePath: z.string().startsWith('/').default('/initialize'),
    initializeTimeoutMs: z.number().int().positive().default(10_000),
    requestTimeoutMs: z.number().int().positive().default(10_000),
    slowThresholdMs: z.number().int().positive().default(1_000),
  }).default({}),
  load: z.object({
    initialWorkers: z.number().int().min(1).default(10),
    initialLevelUp: z.number().int().min(0).default(1),
    levelUpStep: z.number().int().min(1).default(5),
  }).default({}),
  escalation: z.object({
    tickIntervalMs: z.number().int().positive().default(1_000),
    signalWindowMs: z.number().int().positive().default(5_000),
  }).default({}),
  validation: z.object({
    penaltyMs: z.number().int().min(0).default(500),
  }).default({}),
  report: z.object({
    maxErrors: z.number().int().min(1).default(100),
    outputPath: z.string().optional(),
  }).default({}),
  scenario: z.object({
    name: z.string().default('http-smoke'),
    paths: z.array(z.string().startsWith('/')).default(['/']),
  }).default({}),
});

export type BenchConfig = z.infer<typeof BenchConfigSchema>;

/** Deep-partial input accepted by ConfigManager.load(). */
export type BenchConfigInput = z.input<typeof BenchConfigSchema>;

// ===== Run =====

export type BenchPhase = 'initialize' | 'pretest' | 'load' | 'score' | 'done';

/**
 * Final artifact of a run. Built once by the orchestrator and never
 * mutated afterwards.
 */
export interface BenchResult {
  jobId: string;
  targets: string[];
  score: number;
  pass: boolean;
  loadLevel: number;
  errors: string[];
  message: string;
  startTime: string;
  endTime: string;
  logs: string[];
}

export interface ScoreInputs {
  getCount: number;
  fetchCount: number;
  notModifiedCount: number;
  postCount: number;
  messageCount: number;
}

export type EscalationDecision =
  | { kind: 'disabled' }
  | { kind: 'withheld'; reason: 'error'; error: Error; ageMs: number }
  | { kind: 'withheld'; reason: 'slow-path'; path: string; ageMs: number }
  | { kind: 'escalated'; level: number };

// ===== Events =====

export interface BenchEvents {
  'bench:phase': { phase: BenchPhase };
  'bench:complete': { result: BenchResult };
  'check:completed': { name: string; durationMs: number; error?: Error };
  'escalation:decision': { decision: EscalationDecision };
  'worker:stopped': { workerId: number; operation: string; error: Error };
}
