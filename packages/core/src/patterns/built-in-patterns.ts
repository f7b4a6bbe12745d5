/**
 * @module patterns/built-in-patterns
 * Causal patterns shipped by default, ordered most-specific-first.
 */

import type { DiagnosticBundle } from '../types.js';
import type { PatternDefinition } from './pattern-detector.js';
import { PatternDetector } from './pattern-detector.js';

const signalText = (bundle: DiagnosticBundle): string =>
  [...bundle.rawSignals, ...Object.values(bundle.attributes)].join('\n').toLowerCase();

const containsAny = (bundle: DiagnosticBundle, needles: string[]): boolean => {
  const text = signalText(bundle);
  return needles.some((n) => text.includes(n.toLowerCase()));
};

const matchesAny = (bundle: DiagnosticBundle, patterns: RegExp[]): boolean => {
  const text = signalText(bundle);
  return patterns.some((p) => p.test(text));
};

export const BUILT_IN_PATTERNS: PatternDefinition[] = [
  {
    id: 'resource_exhaustion',
    category: 'resources',
    description: 'Process killed or evicted for exceeding its memory limit',
    match: (bundle) =>
      bundle.attributes['exit_code'] === '137' ||
      containsAny(bundle, ['OOMKilled', 'out of memory', 'memory limit exceeded', 'Evicted', 'exit code 137']),
  },
  {
    id: 'port_conflict',
    category: 'networking',
    description: 'Listener cannot bind because the port is taken',
    match: (bundle) =>
      containsAny(bundle, ['EADDRINUSE', 'address already in use', 'port is already allocated']),
  },
  {
    id: 'dependency_unavailable',
    category: 'connectivity',
    description: 'Upstream service or database unreachable',
    match: (bundle) =>
      containsAny(bundle, ['ECONNREFUSED', 'connection refused', 'no route to host', 'ENOTFOUND', 'could not connect', 'connection timed out']),
  },
  {
    id: 'permission_denied',
    category: 'access',
    description: 'Operation rejected for missing permissions',
    match: (bundle) =>
      containsAny(bundle, ['permission denied', 'EACCES', 'forbidden', 'unauthorized']),
  },
  {
    id: 'missing_resource',
    category: 'configuration',
    description: 'Referenced image, config, secret or volume does not exist',
    match: (bundle) =>
      containsAny(bundle, ['ImagePullBackOff', 'ErrImagePull', 'CreateContainerConfigError', 'no such file or directory']) ||
      matchesAny(bundle, [/\b(configmap|secret|persistentvolumeclaim|volume)s?\s+"?[\w.-]+"?\s+not found/]),
  },
  {
    id: 'fatal_crash',
    category: 'stability',
    description: 'Process exits repeatedly on an unhandled error',
    match: (bundle) =>
      containsAny(bundle, ['CrashLoopBackOff', 'panic:', 'segmentation fault', 'Traceback (most recent call last)', 'fatal error', 'unhandled exception']),
  },
];

/** Factory that creates a PatternDetector pre-loaded with the built-in patterns. */
export function createDefaultDetector(): PatternDetector {
  return new PatternDetector(BUILT_IN_PATTERNS);
}
