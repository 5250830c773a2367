import { StructuralTypeError } from '../errors';
import type { AccessSegment, Segment } from '../operators/segment';
import { describeKind, isContainer } from '../value/kinds';
import type { TraversalScope } from './scope';

/**
 * One pending unit of work: the operators still to apply, the value they
 * apply to and the concrete path that led there.
 */
export interface Frame {
  readonly ops: readonly Segment[];
  readonly node: unknown;
  readonly prefix: readonly Segment[];
  readonly scope: TraversalScope;
}

/** A value reached by a traversal and the concrete path to it. */
export interface WalkResult {
  readonly path: readonly Segment[];
  readonly value: unknown;
}

/** One step of the route a mutation has taken, kept for error messages. */
export interface PathStep {
  readonly segment: AccessSegment;
  readonly key: unknown;
}

/**
 * Per-call state threaded through an update.
 *
 * - hasDefaults:   the subtree was just synthesised and may be walked freely
 * - nop:           the current operator matches but must not write
 * - nopFromUnwrap: `nop` comes from the operator's own wrapper and does not
 *                  propagate to its children
 */
export interface MutationState {
  readonly hasDefaults: boolean;
  readonly path: readonly PathStep[];
  readonly nop: boolean;
  readonly nopFromUnwrap: boolean;
}

export const INITIAL_STATE: MutationState = {
  hasDefaults: false,
  path: [],
  nop: false,
  nopFromUnwrap: false
};

/**
 * Stack of frame stacks. Groups open a level for each branch so that the
 * branch's frames are drained before the next branch starts.
 */
export class DepthStack {
  private readonly levels: Frame[][] = [[]];

  get level(): number {
    return this.levels.length - 1;
  }

  private get current(): Frame[] {
    return this.levels[this.levels.length - 1];
  }

  push(frame: Frame): void {
    this.current.push(frame);
  }

  pop(): Frame | undefined {
    return this.current.pop();
  }

  hasFrames(): boolean {
    return this.current.length > 0;
  }

  pushLevel(): void {
    this.levels.push([]);
  }

  popLevel(): void {
    if (this.levels.length > 1) this.levels.pop();
  }
}

/**
 * Drains the current level of `stack` depth-first.
 *
 * Logic:
 * 1. A frame with no operators left is a result.
 * 2. Otherwise its head operator pushes the child frames (simple operators)
 *    or returns finished results (groups, which process their branches on a
 *    level of their own).
 */
export function* process(stack: DepthStack): Generator<WalkResult> {
  const level = stack.level;
  while (stack.level >= level && stack.hasFrames()) {
    const frame = stack.pop();
    if (frame === undefined) return;
    if (frame.ops.length === 0) {
      yield { path: frame.prefix, value: frame.node };
      continue;
    }
    const [head, ...tail] = frame.ops;
    yield* head.pushChildren(stack, { ...frame, ops: tail });
  }
}

/**
 * Lazily yields every value `ops` selects from `node`, with its concrete path.
 */
export function* walk(
  ops: readonly Segment[],
  node: unknown,
  scope: TraversalScope
): Generator<WalkResult> {
  const stack = new DepthStack();
  stack.push({ ops, node, prefix: [], scope });
  yield* process(stack);
}

/** Whether `ops` selects anything from `node`. */
export function selectsAny(
  ops: readonly Segment[],
  node: unknown,
  scope: TraversalScope
): boolean {
  return walk(ops, node, scope).next().done !== true;
}

/**
 * Renders the route a mutation took, for error messages.
 */
export function formatPath(steps: readonly PathStep[]): string {
  return steps
    .map((step, i) => step.segment.concrete(step.key).render(i === 0))
    .join('');
}

/**
 * Applies an update through `ops`.
 *
 * @throws {StructuralTypeError} When the head operator needs a container and
 *   `node` is a scalar outside a freshly built default.
 */
export function applyUpdates(
  ops: readonly Segment[],
  node: unknown,
  payload: unknown,
  state: MutationState,
  scope: TraversalScope
): unknown {
  if (ops.length === 0) return payload;
  const [head, ...tail] = ops;
  if (!state.hasDefaults && head.requiresContainer() && !isContainer(node)) {
    throw new StructuralTypeError(formatPath(state.path), describeKind(node));
  }
  return head.applyUpdate(tail, node, payload, state, scope);
}

/** Applies a removal through `ops`. */
export function applyRemovals(
  ops: readonly Segment[],
  node: unknown,
  payload: unknown,
  nop: boolean,
  scope: TraversalScope
): unknown {
  if (ops.length === 0) return node;
  const [head, ...tail] = ops;
  return head.applyRemove(tail, node, payload, nop, scope);
}

/**
 * Builds the structure `ops` would navigate, innermost first: the last
 * operator's leaf default, wrapped by each earlier operator's default.
 */
export function buildDefault(
  ops: readonly Segment[],
  scope: TraversalScope
): unknown {
  if (ops.length === 0) return null;
  const [head, ...tail] = ops;
  if (tail.length === 0) return head.leafDefault();
  return head.upsert(head.defaultValue(), buildDefault(tail, scope), scope);
}

/**
 * Whether `path` overlaps any of `paths`: one is a prefix of the other under
 * segment matching.
 */
export function pathsOverlap(
  paths: readonly (readonly Segment[])[],
  path: readonly Segment[]
): boolean {
  return paths.some((other) => {
    const length = Math.min(other.length, path.length);
    for (let i = 0; i < length; i += 1) {
      if (other[i].matchSegment(path[i], true) === undefined) return false;
    }
    return true;
  });
}
