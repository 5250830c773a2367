/**
 * A scenario's input, given directly or through a builder. Builders are for
 * inputs that must be allocated per run: self-referencing containers, shared
 * children, frozen roots a test inspects afterwards. Give builders a name;
 * scenario tables do not hold inline lambdas.
 */
export type ScenarioInput<T> = T | (() => T);

/**
 * One row of a scenario table, run through `test.for`.
 *
 * @template TInput - What the call under test receives, e.g. a `ReadInput`.
 * @template TExpected - What the call returns, or `undefined` for no result.
 */
export type TestScenario<TInput = unknown, TExpected = unknown> = {
  /** Title-cased label shown in brackets before the description. */
  id: string;

  /** One sentence on the behavior the row pins down. */
  description: string;

  input: ScenarioInput<TInput>;

  expected: TExpected;
};
