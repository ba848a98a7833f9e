// Decimal literal with optional exponent, or inf/infinity/nan (any case), optionally signed.
const FLOAT_LITERAL = /^[+-]?(?:(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?|inf(?:inity)?|nan)$/i

/**
 * Parses one whitespace-free token as a float literal.
 *
 * `Number()` alone would take `''`, `'0x10'` and `'  '` as numbers, so the token is
 * matched against the literal grammar first.
 */
export const parseFloatLiteral = (token: string): number | undefined => {
  if (!FLOAT_LITERAL.test(token)) return undefined

  const body = token.replace(/^[+-]/, '').toLowerCase()
  if (body === 'nan') return Number.NaN
  if (body === 'inf' || body === 'infinity') return token.startsWith('-') ? -Infinity : Infinity
  return Number(token)
}

export const isFloatLiteral = (token: string): boolean => parseFloatLiteral(token) !== undefined

export const splitWhitespace = (text: string): ReadonlyArray<string> => text.split(/\s+/).filter((t) => t.length > 0)
