import type { Bound } from './kinds'

// ============================================================================
// Type-level comparison of numeric literal types
// ============================================================================
//
// Works on the decimal text of a literal (`${-10.5}` is "-10.5"). Literal
// types never carry leading zeros or trailing fractional zeros, which keeps
// digit-by-digit comparison sound. Exponent forms ("1e+21", "5e-7") are not
// handled here; callers check `IsPlainDecimal` first.

export type Ordering = 'lt' | 'eq' | 'gt'

type Digit = '0' | '1' | '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9'

type DigitLess<A extends Digit, B extends Digit> =
	'0123456789' extends `${string}${A}${string}${B}${string}` ? true : false

type CompareLength<A extends string, B extends string> =
	A extends `${Digit}${infer AR}`
		? B extends `${Digit}${infer BR}`
			? CompareLength<AR, BR>
			: 'gt'
		: B extends ''
			? 'eq'
			: 'lt'

type CompareDigits<A extends string, B extends string> =
	A extends `${infer AH extends Digit}${infer AR}`
		? B extends `${infer BH extends Digit}${infer BR}`
			? AH extends BH
				? CompareDigits<AR, BR>
				: DigitLess<AH, BH> extends true
					? 'lt'
					: 'gt'
			: 'gt'
		: B extends ''
			? 'eq'
			: 'lt'

type IntegerPart<S extends string> = S extends `${infer I}.${string}` ? I : S
type FractionPart<S extends string> = S extends `${string}.${infer F}` ? F : ''

type CompareIntegers<A extends string, B extends string> =
	CompareLength<A, B> extends 'eq' ? CompareDigits<A, B> : CompareLength<A, B>

type CompareUnsigned<A extends string, B extends string> =
	CompareIntegers<IntegerPart<A>, IntegerPart<B>> extends 'eq'
		? CompareDigits<FractionPart<A>, FractionPart<B>>
		: CompareIntegers<IntegerPart<A>, IntegerPart<B>>

type Flip<O extends Ordering> = O extends 'lt' ? 'gt' : O extends 'gt' ? 'lt' : 'eq'

/** Orders two plain decimal strings such as "-128" and "127.5". */
export type CompareDecimal<A extends string, B extends string> =
	A extends `-${infer AbsA}`
		? B extends `-${infer AbsB}`
			? Flip<CompareUnsigned<AbsA, AbsB>>
			: 'lt'
		: B extends `-${string}`
			? 'gt'
			: CompareUnsigned<A, B>

export type IsPlainDecimal<S extends string> = S extends `${string}e${string}`
	? false
	: true

export type IsWholeDecimal<S extends string> = S extends
	| `${string}.${string}`
	| `${string}e${string}`
	? false
	: true

export type Magnitude<S extends string> = S extends `-${infer M}` ? M : S

export type NotAbove<A extends string, B extends string> =
	CompareDecimal<A, B> extends 'gt' ? false : true

export type Within<S extends string, Lo extends string, Hi extends string> =
	CompareDecimal<S, Lo> extends 'lt'
		? false
		: CompareDecimal<S, Hi> extends 'gt'
			? false
			: true

type IsUnion<T, U = T> = T extends unknown
	? [U] extends [T]
		? false
		: true
	: false

/** `true` only for a single `number` or `bigint` literal type. */
export type IsLiteral<B extends Bound> = number extends B
	? false
	: bigint extends B
		? false
		: [IsUnion<B>] extends [false]
			? true
			: false

// ============================================================================
// Runtime comparison
// ============================================================================

export function isWhole(value: Bound): boolean {
	return typeof value === 'bigint' || Number.isInteger(value)
}

/**
 * Exact three-way comparison of two bounds. Whole values are compared as
 * bigints so that e.g. 2^63 - 1 and 2^63 stay distinct.
 */
export function compareExact(a: Bound, b: Bound): -1 | 0 | 1 {
	if (isWhole(a) && isWhole(b)) {
		const x = BigInt(a)
		const y = BigInt(b)
		return x < y ? -1 : x > y ? 1 : 0
	}
	const x = Number(a)
	const y = Number(b)
	return x < y ? -1 : x > y ? 1 : 0
}
