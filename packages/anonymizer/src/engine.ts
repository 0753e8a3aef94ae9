/**
 * Anonymization Engine
 *
 * Applies a profile's rules, in order, to one dataset.
 *
 * CRITICAL INVARIANTS:
 * - No rule ever creates a tag that was missing before the run
 * - A failing rule is recorded as FAILED and never stops the run
 * - The audit log is returned with the result; the engine keeps no state
 *   between runs
 * - inPlace=false works on a deep clone and leaves the input untouched
 */

import {
  cloneDataset,
  createConfiguredLogger,
  createLogger,
  defaultProfileStore,
  getErrorMessage,
  hashValue,
  isSequenceElement,
  resolveHashSettings,
  type Action,
  type Dataset,
  type HashAlgorithm,
  type Logger,
  type PrivacyConfig,
  type ProfileRule,
  type ProfileSelection,
  type ProfileStore,
  type TagId,
} from '@phikit/core';
import { ActionOutcome, UnknownActionError, formatLogLine, handlerFor, type ActionContext } from './actions.js';

export interface ActionRecord {
  tag: TagId;
  action: Action;
  outcome: ActionOutcome;
  detail?: string;
}

export interface AnonymizationResult {
  dataset: Dataset;
  /** One human-readable line per rule, in rule order */
  log: string[];
  records: ActionRecord[];
}

export interface AnonymizationEngineOptions {
  salt?: string;
  algorithm?: HashAlgorithm;
  /** Hex characters kept from the digest */
  hashLength?: number;
  profiles?: ProfileStore;
  logger?: Logger;
}

export interface ApplyOptions {
  /** Mutate the caller's dataset instead of a clone (default: false) */
  inPlace?: boolean;
}

export class AnonymizationEngine {
  private readonly context: ActionContext;
  private readonly profiles: ProfileStore;
  private readonly logger: Logger;

  /**
   * Throws ConfigError when the hash settings are invalid (unknown
   * algorithm, length outside [8, 128]).
   */
  constructor(options: AnonymizationEngineOptions = {}) {
    const settings = resolveHashSettings({
      salt: options.salt,
      algorithm: options.algorithm,
      length: options.hashLength,
    });

    this.context = { hash: (value) => hashValue(value, settings) };
    this.profiles = options.profiles ?? defaultProfileStore;
    this.logger = options.logger ?? createLogger('anonymizer');
  }

  /**
   * Engine with the configured hash settings. Without an injected logger,
   * logs at the configured level.
   */
  static fromConfig(
    config: PrivacyConfig,
    options: Pick<AnonymizationEngineOptions, 'profiles' | 'logger'> = {}
  ): AnonymizationEngine {
    return new AnonymizationEngine({
      profiles: options.profiles,
      logger: options.logger ?? createConfiguredLogger('anonymizer', config),
      salt: config.hash.salt,
      algorithm: config.hash.algorithm,
      hashLength: config.hash.length,
    });
  }

  /**
   * Resolves the selection and applies its rules.
   * Throws ProfileValidationError for an inline list with duplicate tags,
   * before any rule runs.
   */
  apply(dataset: Dataset, selection: ProfileSelection, options: ApplyOptions = {}): AnonymizationResult {
    const rules = this.profiles.resolve(selection);
    const target = options.inPlace ? dataset : cloneDataset(dataset);

    const log: string[] = [];
    const records: ActionRecord[] = [];

    for (const rule of rules) {
      const { record, line } = this.applyRule(target, rule);
      records.push(record);
      log.push(line);
    }

    this.logger.info('Applied profile', {
      profile: selection.kind === 'named' ? selection.name : 'inline',
      rules: rules.length,
      failed: records.filter((r) => r.outcome === ActionOutcome.FAILED).length,
    });

    return { dataset: target, log, records };
  }

  private applyRule(dataset: Dataset, rule: ProfileRule): { record: ActionRecord; line: string } {
    const { tag, action } = rule;
    const done = (outcome: ActionOutcome, detail?: string) => {
      const record: ActionRecord = detail === undefined ? { tag, action, outcome } : { tag, action, outcome, detail };
      return { record, line: formatLogLine(rule, outcome, detail) };
    };

    try {
      const handler = handlerFor(action);
      if (!handler) throw new UnknownActionError(action);

      if (!dataset.contains(tag)) {
        this.logger.debug(`Tag ${tag} not present, nothing to do`, { tag, action });
        return done(ActionOutcome.NOT_PRESENT);
      }

      const element = dataset.get(tag);
      if (isSequenceElement(element) && handler.sequencePolicy === 'skip') {
        this.logger.warn(`Tag ${tag} is a sequence; ${action} is not applied to sequences`, {
          tag,
          action,
          hint: 'Use REMOVE to delete the sequence or KEEP to leave it unchanged',
        });
        return done(ActionOutcome.SKIPPED_SEQUENCE);
      }

      return done(handler.run(dataset, element, rule, this.context));
    } catch (error) {
      const detail = getErrorMessage(error);
      this.logger.warn(`Could not apply ${action} to ${tag}`, { tag, action, error: detail });
      return done(ActionOutcome.FAILED, detail);
    }
  }
}
