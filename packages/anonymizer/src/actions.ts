/**
 * Action Handlers
 *
 * One handler per Action. Each handler declares what it does with a
 * sequence-valued element:
 * - 'apply': the handler runs on the sequence as on any element
 * - 'skip': the element is left untouched and the skip is reported
 *
 * CRITICAL INVARIANTS:
 * - Handlers only run on elements already present in the dataset
 * - No handler ever creates a tag
 */

import {
  Action,
  isEmptyValue,
  stringifyElement,
  type DataElement,
  type Dataset,
  type ProfileRule,
} from '@phikit/core';

export enum ActionOutcome {
  APPLIED = 'APPLIED',
  NOT_PRESENT = 'NOT_PRESENT',
  ALREADY_EMPTY = 'ALREADY_EMPTY',
  KEPT = 'KEPT',
  SKIPPED_SEQUENCE = 'SKIPPED_SEQUENCE',
  FAILED = 'FAILED',
}

export type SequencePolicy = 'apply' | 'skip';

export interface ActionContext {
  hash(value: string): string;
}

export interface ActionHandler {
  readonly sequencePolicy: SequencePolicy;
  /** Past-tense verb used in audit log lines */
  readonly verb: string;
  run(dataset: Dataset, element: DataElement, rule: ProfileRule, context: ActionContext): ActionOutcome;
}

export class MissingReplacementError extends Error {
  constructor(readonly tag: string) {
    super('no replacement value');
    this.name = 'MissingReplacementError';
  }
}

export class UnknownActionError extends Error {
  constructor(readonly action: string) {
    super(`unknown action ${action}`);
    this.name = 'UnknownActionError';
  }
}

export const ACTION_HANDLERS: Readonly<Record<Action, ActionHandler>> = {
  [Action.REMOVE]: {
    sequencePolicy: 'apply',
    verb: 'REMOVED',
    run(dataset, element) {
      dataset.delete(element.tag);
      return ActionOutcome.APPLIED;
    },
  },

  [Action.HASH]: {
    sequencePolicy: 'skip',
    verb: 'HASHED',
    run(dataset, element, _rule, context) {
      // Empty values are hashed too: hash("") differs from "".
      dataset.set(element.tag, context.hash(stringifyElement(element)));
      return ActionOutcome.APPLIED;
    },
  },

  [Action.EMPTY]: {
    sequencePolicy: 'skip',
    verb: 'EMPTIED',
    run(dataset, element) {
      if (isEmptyValue(element.value)) return ActionOutcome.ALREADY_EMPTY;
      dataset.set(element.tag, '');
      return ActionOutcome.APPLIED;
    },
  },

  [Action.KEEP]: {
    sequencePolicy: 'apply',
    verb: 'KEPT',
    run() {
      return ActionOutcome.KEPT;
    },
  },

  [Action.REPLACE]: {
    sequencePolicy: 'skip',
    verb: 'REPLACED',
    run(dataset, element, rule) {
      if (rule.replacementValue === undefined) {
        throw new MissingReplacementError(element.tag);
      }
      dataset.set(element.tag, rule.replacementValue);
      return ActionOutcome.APPLIED;
    },
  },
};

const HANDLERS_BY_NAME: ReadonlyMap<string, ActionHandler> = new Map(Object.entries(ACTION_HANDLERS));

/**
 * Handler for an action, or undefined for a value outside the Action enum
 * (rules built by untyped callers).
 */
export function handlerFor(action: string): ActionHandler | undefined {
  return HANDLERS_BY_NAME.get(action);
}

const OUTCOME_SUFFIX: Readonly<Record<ActionOutcome, string>> = {
  [ActionOutcome.APPLIED]: '',
  [ActionOutcome.KEPT]: '',
  [ActionOutcome.NOT_PRESENT]: ' (not present)',
  [ActionOutcome.ALREADY_EMPTY]: ' (already empty)',
  [ActionOutcome.SKIPPED_SEQUENCE]: ' (skipped: sequence)',
  [ActionOutcome.FAILED]: ' (failed)',
};

/**
 * Audit log line for one rule, e.g. `HASHED: PatientID` or
 * `EMPTIED: StudyDate (already empty)`.
 */
export function formatLogLine(rule: ProfileRule, outcome: ActionOutcome, detail?: string): string {
  const verb = handlerFor(rule.action)?.verb ?? String(rule.action);
  const head =
    rule.action === Action.REPLACE
      ? `${verb}: ${rule.tag} -> ${rule.replacementValue ?? ''}`
      : `${verb}: ${rule.tag}`;

  if (outcome === ActionOutcome.FAILED && detail) {
    return `${head} (failed: ${detail})`;
  }
  return `${head}${OUTCOME_SUFFIX[outcome]}`;
}
