import { z } from 'zod';

import { firstFailure } from '../evaluation/evaluate.js';
import { LIMITS } from '../config/defaults.js';
import { ConfigurationError } from '../utils/errors.js';
import * as log from '../utils/logger.js';
import type { Field } from './field.js';
import { evaluationResultsKey } from './field.js';
import type { ModuleInputs, ModuleOutput } from './promptModule.js';

// ── Public types ─────────────────────────────────────────────

export type RevisionPhase =
  | 'generated'
  | 'evaluating'
  | 'revising'
  | 'passed'
  | 'exhausted';

export type RevisionStatus = Extract<RevisionPhase, 'passed' | 'exhausted'>;

/** The module that rewrites a failing candidate. Its last output is the target field. */
export interface Reviser {
  readonly outputs: readonly Field[];
  call(inputs: ModuleInputs): Promise<ModuleOutput>;
}

export interface RevisorOptions {
  reviser: Reviser;
  maxRevisions?: number | undefined;
  onPhase?: ((phase: RevisionPhase, state: Readonly<RevisionState>) => void) | undefined;
}

export interface RevisionState {
  phase: RevisionPhase;
  candidate: string;
  /** Serialized failing EvalResult, or '' when the last round passed. */
  evaluationResults: string;
  revisions: number;
}

export interface RevisionReport {
  /** The target field and `<field>_evaluation_results`. */
  outputs: ModuleOutput;
  status: RevisionStatus;
  revisions: number;
}

const maxRevisionsSchema = z.number().int().nonnegative();

// ── Revisor ──────────────────────────────────────────────────

/**
 * Generate → evaluate → revise, bounded by `maxRevisions`.
 *
 * Each round runs the target field's evaluations (deterministic first) and
 * stops at the first failure. A failing round with budget left hands the
 * failure to the reviser; a non-empty revised value becomes the next
 * candidate. Running out of budget is not an error: the last candidate and
 * its failing result are returned.
 */
export class Revisor {
  readonly field: Field;

  constructor(
    private readonly reviser: Reviser,
    readonly maxRevisions: number,
    private readonly onPhase?: RevisorOptions['onPhase'],
  ) {
    if (!maxRevisionsSchema.safeParse(maxRevisions).success) {
      throw new ConfigurationError(
        `maxRevisions must be a non-negative integer, got ${String(maxRevisions)}`,
      );
    }

    const field = reviser.outputs.at(-1);
    if (!field) {
      throw new ConfigurationError('Reviser module has no output fields');
    }
    this.field = field;
  }

  async revise(inputs: ModuleInputs): Promise<RevisionReport> {
    const name = this.field.name;
    const resultsKey = evaluationResultsKey(this.field);

    const initial = inputs[name];
    if (typeof initial !== 'string') {
      throw new Error(`Revisor needs an initial "${name}" candidate`);
    }

    const state: RevisionState = {
      phase: 'generated',
      candidate: initial,
      evaluationResults: '',
      revisions: 0,
    };
    this.enter(state, 'generated');

    for (let round = 0; round <= this.maxRevisions; round++) {
      this.enter(state, 'evaluating');
      const failure = await firstFailure(this.field.evaluations, {
        ...inputs,
        [name]: state.candidate,
        [resultsKey]: state.evaluationResults,
      });

      if (!failure) {
        log.evaluation(true, name, 'all requirements met');
        state.evaluationResults = '';
        return this.finish(state, 'passed');
      }

      log.evaluation(false, name, failure.requirement);
      state.evaluationResults = JSON.stringify(failure);
      if (round === this.maxRevisions) break;

      this.enter(state, 'revising');
      log.revision(round, failure.reason);
      const revised = await this.reviser.call({
        ...inputs,
        [name]: state.candidate,
        [resultsKey]: state.evaluationResults,
        evaluation_result: JSON.stringify(failure, null, 2),
      });
      state.revisions++;

      const next = revised[name]?.trim();
      if (next) state.candidate = next;
    }

    return this.finish(state, 'exhausted');
  }

  private enter(state: RevisionState, phase: RevisionPhase): void {
    state.phase = phase;
    this.onPhase?.(phase, state);
  }

  private finish(state: RevisionState, status: RevisionStatus): RevisionReport {
    this.enter(state, status);
    return {
      outputs: {
        [this.field.name]: state.candidate,
        [evaluationResultsKey(this.field)]: state.evaluationResults,
      },
      status,
      revisions: state.revisions,
    };
  }
}

export function createRevisor(options: RevisorOptions): Revisor {
  return new Revisor(
    options.reviser,
    options.maxRevisions ?? LIMITS.MAX_REVISIONS,
    options.onPhase,
  );
}
