/**
 * Registry format checks and post-resolution validation.
 *
 * Both checks are pure: they return diagnostics and leave appending them to
 * a log, and deciding whether to abort, to the caller.
 *
 * @packageDocumentation
 */

import type { OptionRegistry } from '../options/index.js';
import type { Diagnostic } from './diagnostics.js';
import type { ResolvedOptions } from './resolved.js';

/**
 * Checks a registry for declaration mistakes before any token is read.
 *
 * Errors:
 * - an option with an empty key
 * - an optional option without a default value
 * - a shortflag declared by more than one option
 *
 * Warnings (visible options only):
 * - an option without a description
 * - an option without a shortflag
 *
 * @param registry - The registry to check.
 * @returns Diagnostics in registry order.
 */
export function checkFormat(registry: OptionRegistry): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const shortflagOwners = new Map<string, string>();

  for (const spec of registry.options()) {
    if (spec.key === '') {
      diagnostics.push({
        severity: 'error',
        subject: spec.key,
        message: 'Option key cannot be empty',
      });
    }

    if (!spec.required && spec.defaultValue.isEmpty()) {
      diagnostics.push({
        severity: 'error',
        subject: spec.key,
        message: `Option '${spec.key}' is not required but has no default value`,
      });
    }

    if (spec.shortflag !== '') {
      const owner = shortflagOwners.get(spec.shortflag);
      if (owner === undefined) {
        shortflagOwners.set(spec.shortflag, spec.key);
      } else {
        diagnostics.push({
          severity: 'error',
          subject: spec.key,
          message: `Shortflag '-${spec.shortflag}' of '${spec.key}' is already used by '${owner}'`,
        });
      }
    }

    if (spec.hidden) {
      continue;
    }
    if (spec.description === '') {
      diagnostics.push({
        severity: 'warning',
        subject: spec.key,
        message: `Option '${spec.key}' has no description`,
      });
    }
    if (spec.shortflag === '') {
      diagnostics.push({
        severity: 'warning',
        subject: spec.key,
        message: `Option '${spec.key}' has no shortflag`,
      });
    }
  }

  return diagnostics;
}

/**
 * Checks resolved values after all precedence layers have been applied.
 *
 * Every visible registry option must be present and non-empty, and every
 * stray entry must be non-empty.
 *
 * @param registry - The registry resolution ran against.
 * @param values - The resolved values, with reserved entries already removed.
 * @returns Error diagnostics, one per offending key.
 */
export function validate(registry: OptionRegistry, values: ResolvedOptions): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];

  for (const spec of registry.options()) {
    if (spec.hidden) {
      continue;
    }
    if (!values.has(spec.key)) {
      diagnostics.push({
        severity: 'error',
        subject: spec.key,
        message: `Option '${spec.key}' is missing`,
      });
    } else if (values.get(spec.key).isEmpty()) {
      diagnostics.push({
        severity: 'error',
        subject: spec.key,
        message: `Option '${spec.key}' has no value`,
      });
    }
  }

  for (const key of values.strayKeys()) {
    if (values.get(key).isEmpty()) {
      diagnostics.push({
        severity: 'error',
        subject: key,
        message: `Option '${key}' has no value`,
      });
    }
  }

  return diagnostics;
}
