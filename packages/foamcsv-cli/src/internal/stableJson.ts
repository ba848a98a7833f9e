const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype

// Object keys are emitted in sorted order so the run summary diffs cleanly between runs.
export const stableStringifyJson = (value: unknown, space?: number): string =>
  JSON.stringify(
    value,
    (_key, input: unknown) => {
      if (!isPlainObject(input)) return input
      return Object.fromEntries(Object.keys(input).sort().map((key) => [key, input[key]]))
    },
    space,
  )
