// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG VALIDATION — Descriptor Consistency Checks Against Discovery
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../observability/logging/index.js';
import type { ModuleDescriptor, RuntimeSide } from '../types/module.js';
import { ConfigError } from './errors.js';
import { runsOnSide } from './loader.js';
import { resolveOrder } from './resolver.js';

const logger = getLogger({ component: 'validate' });

export type ValidationCategory =
  | 'missing-module'
  | 'missing-dependency'
  | 'shared-dependency'
  | 'side-mismatch'
  | 'cycle';

export interface ValidationIssue {
  readonly category: ValidationCategory;
  readonly module: string;
  readonly message: string;
}

export interface ValidateOptions {
  readonly modules: Readonly<Record<string, ModuleDescriptor>>;
  readonly side: RuntimeSide;
  readonly isDiscovered: (name: string) => boolean;
  readonly strict: boolean;
  readonly reportError?: (source: string, message: string) => void;
}

/**
 * Check the descriptors that run on `side`. Does not throw.
 */
export function collectValidationIssues(
  options: Omit<ValidateOptions, 'strict' | 'reportError'>
): ValidationIssue[] {
  const { modules, side, isDiscovered } = options;
  const issues: ValidationIssue[] = [];
  const relevant = Object.keys(modules).filter((name) => runsOnSide(modules[name].location, side));

  for (const name of relevant) {
    const descriptor = modules[name];

    if (!isDiscovered(name)) {
      issues.push({ category: 'missing-module', module: name, message: `Module not found for ${name}` });
    }

    for (const dependency of descriptor.dependencies) {
      const target = modules[dependency];
      if (!target) {
        issues.push({
          category: 'missing-dependency',
          module: name,
          message: `Missing dependency config '${dependency}' for ${name}`,
        });
        continue;
      }
      if (descriptor.location === 'shared' && target.location !== 'shared') {
        issues.push({
          category: 'shared-dependency',
          module: name,
          message: `Side mismatch: shared module ${name} depends on ${target.location}-only ${dependency}`,
        });
      } else if (
        descriptor.location !== 'shared' &&
        target.location !== 'shared' &&
        descriptor.location !== target.location
      ) {
        issues.push({
          category: 'side-mismatch',
          module: name,
          message: `Side mismatch: ${descriptor.location} module ${name} depends on ${target.location} ${dependency}`,
        });
      }
    }
  }

  const order = resolveOrder({
    names: relevant,
    dependenciesOf: (name) => modules[name]?.dependencies ?? [],
    isDeclared: () => true,
    strict: false,
  });
  if (!order.ok) {
    issues.push({
      category: 'cycle',
      module: order.error.members.join(', '),
      message: `Dependency cycle in modules: ${order.error.members.join(', ')}`,
    });
  }

  return issues;
}

/**
 * Validate descriptors. Strict mode throws one aggregated ConfigError;
 * otherwise each issue is logged and the summary goes to the error sink.
 *
 * @throws ConfigError under strict mode when any issue is found
 */
export function validateModules(options: ValidateOptions): ValidationIssue[] {
  const issues = collectValidationIssues(options);
  if (issues.length === 0) return issues;

  const messages = issues.map((issue) => issue.message);
  if (options.strict) {
    throw new ConfigError(messages);
  }

  for (const issue of issues) {
    logger.warn(issue.message, { module: issue.module, category: issue.category });
  }
  options.reportError?.('validate', new ConfigError(messages).message);
  return issues;
}
