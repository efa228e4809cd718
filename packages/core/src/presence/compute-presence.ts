import { ErrorCode } from '../errors/codes.js';
import { SecurityGuard, type Limits } from '../guard/security-guard.js';
import {
  InputError,
  ResourceLimitError,
  type FieldwardenError,
} from '../types/errors.js';
import {
  attempt,
  err,
  isErr,
  ok,
  type Result,
} from '../types/result.js';
import { PresenceMap } from './presence-map.js';

export type PresenceLimits = Partial<Pick<Limits, 'maxDepth' | 'maxFields'>>;

export interface PresenceResult {
  presence: PresenceMap;
  /** Set when at least one container sat at the depth limit */
  depthExceeded: boolean;
  /** Container paths whose children were not expanded */
  truncatedPaths: readonly string[];
}

interface Frame {
  path: string;
  node: unknown;
  depth: number;
}

type Container = Record<string, unknown> | unknown[];

function isContainer(node: unknown): node is Container {
  return typeof node === 'object' && node !== null;
}

function childEntries(node: Container): Array<[string, unknown]> {
  if (Array.isArray(node)) {
    return node.map((child, index) => [String(index), child]);
  }
  return Object.entries(node);
}

function describe(value: unknown): string {
  return value === null ? 'null' : typeof value;
}

function isSyntaxError(error: unknown): error is SyntaxError {
  return error instanceof SyntaxError;
}

function parseRaw(raw: string): Result<unknown, InputError> {
  return attempt((): unknown => JSON.parse(raw), isSyntaxError).mapErr(
    (cause) =>
      new InputError({
        message: 'raw payload is not valid JSON',
        errorCode: ErrorCode.MALFORMED_INPUT,
        cause,
      })
  );
}

/**
 * Compute the set of field paths present in a raw serialized record.
 *
 * `raw` is JSON text or an already-parsed tree. The walk uses an explicit
 * stack, so input nesting never grows the host call stack. Containers at
 * `maxDepth` are left unexpanded (soft limit); recording more than
 * `maxFields` paths fails the whole call (hard limit).
 */
export function computePresence(
  raw: unknown,
  limits: PresenceLimits | SecurityGuard = {}
): Result<PresenceResult, FieldwardenError> {
  const guard =
    limits instanceof SecurityGuard ? limits : new SecurityGuard(limits);

  let tree: unknown = raw;
  if (typeof raw === 'string') {
    const parsed = parseRaw(raw);
    if (isErr(parsed)) return err(parsed.error);
    tree = parsed.value;
  }

  if (!isContainer(tree)) {
    return err(
      new InputError({
        message: `raw payload must be an object or array, got ${describe(tree)}`,
        errorCode: ErrorCode.INVALID_TYPE,
      })
    );
  }

  const counter = guard.fieldCounter();
  const recorded = new Set<string>();
  const truncatedPaths: string[] = [];
  const stack: Frame[] = [{ path: '', node: tree, depth: 0 }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (frame === undefined || !isContainer(frame.node)) continue;

    if (!guard.descends(frame.depth)) {
      truncatedPaths.push(frame.path);
      continue;
    }

    for (const [segment, child] of childEntries(frame.node)) {
      const path = frame.path === '' ? segment : `${frame.path}.${segment}`;
      if (!counter.record()) {
        return err(
          new ResourceLimitError({
            message: `payload has more than ${guard.limits.maxFields} fields`,
            limit: guard.limits.maxFields,
            context: { path },
          })
        );
      }
      recorded.add(path);
      if (isContainer(child)) {
        stack.push({ path, node: child, depth: frame.depth + 1 });
      }
    }
  }

  return ok({
    presence: PresenceMap.reachable(recorded),
    depthExceeded: truncatedPaths.length > 0,
    truncatedPaths,
  });
}
