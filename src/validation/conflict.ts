import { randomInt } from 'crypto';
import type { ConflictStrategy } from '../settings/schema.js';
import type { ValidationResult } from './types.js';

export type ConflictOutcome = 'Accepted' | 'AutoResolved' | 'Conflict' | 'Rejected';

export type RejectionReason = 'conflict' | 'exhausted_attempts' | 'validation_unavailable';

export interface ConflictResolution {
  outcome: ConflictOutcome;
  /** Absent when the name was rejected */
  finalName?: string;
  /** Number of mutated candidates that were validated */
  attempts: number;
  reason?: RejectionReason;
}

export type NameMutator = (name: string) => string;

export interface ConflictResolverOptions {
  validate: (name: string) => Promise<ValidationResult>;
  mutate?: NameMutator;
  maxAttempts?: number;
  suffixLength?: number;
}

export const DEFAULT_MAX_INCREMENT_ATTEMPTS = 10;
export const DEFAULT_SUFFIX_LENGTH = 4;
// Initial random suffix plus one retry
const SUFFIX_RANDOM_ATTEMPTS = 2;

const SUFFIX_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';

/**
 * Increment the trailing instance number, keeping its zero padding
 * (`app-009` -> `app-010`, `app-999` -> `app-1000`). A name without one
 * gets `-1` appended.
 */
export function incrementInstanceNumber(name: string): string {
  const match = /^(.*?)(\d+)$/.exec(name);
  if (!match) {
    return `${name}-1`;
  }
  const [, stem, digits] = match;
  const next = (BigInt(digits) + 1n).toString();
  return `${stem}${next.padStart(digits.length, '0')}`;
}

export function appendRandomSuffix(
  name: string,
  length: number = DEFAULT_SUFFIX_LENGTH,
  pick: (max: number) => number = (max) => randomInt(max)
): string {
  let suffix = '';
  for (let i = 0; i < length; i++) {
    suffix += SUFFIX_ALPHABET[pick(SUFFIX_ALPHABET.length)];
  }
  return `${name}${suffix}`;
}

/**
 * Apply a conflict strategy to a validated candidate name. Mutating
 * strategies re-validate each new candidate through `options.validate`.
 */
export async function resolveConflict(
  candidateName: string,
  result: ValidationResult,
  strategy: ConflictStrategy,
  options: ConflictResolverOptions
): Promise<ConflictResolution> {
  if (!result.existsInAzure) {
    return { outcome: 'Accepted', finalName: candidateName, attempts: 0 };
  }

  switch (strategy) {
    case 'NotifyOnly':
      return { outcome: 'Conflict', finalName: candidateName, attempts: 0 };

    case 'Fail':
      return { outcome: 'Rejected', attempts: 0, reason: 'conflict' };

    case 'AutoIncrement':
      return retryWithMutation(
        candidateName,
        options.mutate ?? incrementInstanceNumber,
        options.maxAttempts ?? DEFAULT_MAX_INCREMENT_ATTEMPTS,
        options.validate,
        // each increment builds on the previous candidate
        true
      );

    case 'SuffixRandom': {
      const length = options.suffixLength ?? DEFAULT_SUFFIX_LENGTH;
      return retryWithMutation(
        candidateName,
        options.mutate ?? ((name) => appendRandomSuffix(name, length)),
        SUFFIX_RANDOM_ATTEMPTS,
        options.validate,
        // a retry replaces the suffix instead of stacking another one
        false
      );
    }
  }
}

async function retryWithMutation(
  original: string,
  mutate: NameMutator,
  maxAttempts: number,
  validate: (name: string) => Promise<ValidationResult>,
  chain: boolean
): Promise<ConflictResolution> {
  let current = original;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    current = mutate(chain ? current : original);
    const check = await validate(current);

    if (!check.validationPerformed) {
      return { outcome: 'Rejected', attempts: attempt, reason: 'validation_unavailable' };
    }
    if (!check.existsInAzure) {
      return { outcome: 'AutoResolved', finalName: current, attempts: attempt };
    }
  }

  return { outcome: 'Rejected', attempts: maxAttempts, reason: 'exhausted_attempts' };
}
