import {
	FLOAT32_MAX,
	inputKindInfo,
	isInputKind,
	type Bound,
	type FloatingKind,
	type InputKind,
	type IntegralKind,
	type NumericCategory
} from './kinds'
import {
	compareExact,
	isWhole,
	type CompareDecimal,
	type IsLiteral,
	type IsPlainDecimal,
	type IsWholeDecimal,
	type Magnitude,
	type NotAbove,
	type Within
} from './decimal'

// ============================================================================
// Numeric category
// ============================================================================

/** Category of a kind, of an input kind, or of a category itself. */
export type CategoryOf<T> = T extends NumericCategory
	? T
	: T extends IntegralKind | 'bigint'
		? 'integral'
		: T extends FloatingKind | 'number'
			? 'floating'
			: never

/** Both integral, or both floating-point. */
export type SameNumericCategory<T, U> = [CategoryOf<T>] extends [never]
	? false
	: [CategoryOf<U>] extends [never]
		? false
		: [CategoryOf<T>] extends [CategoryOf<U>]
			? [CategoryOf<U>] extends [CategoryOf<T>]
				? true
				: false
			: false

export function categoryOf(kind: InputKind): NumericCategory {
	return inputKindInfo(kind).category
}

export function sameNumericCategory(a: InputKind, b: InputKind): boolean {
	return categoryOf(a) === categoryOf(b)
}

// ============================================================================
// Representability
// ============================================================================

interface IntegralLimitText {
	int8: ['-128', '127']
	uint8: ['0', '255']
	int16: ['-32768', '32767']
	uint16: ['0', '65535']
	int32: ['-2147483648', '2147483647']
	uint32: ['0', '4294967295']
	int64: ['-9223372036854775808', '9223372036854775807']
	uint64: ['0', '18446744073709551615']
}

/** Largest whole magnitude a float holds exactly together with all below it. */
type Float64ExactText = '9007199254740992'
type Float32ExactText = '16777216'

type Float32Fits<S extends string> = S extends `${string}e-${string}`
	? true
	: S extends `${string}e${string}`
		? false
		: S extends `${string}.${string}`
			? true
			: NotAbove<Magnitude<S>, Float32ExactText>

type BoundFits<K, B extends Bound> =
	IsLiteral<B> extends false
		? false
		: K extends IntegralKind
			? IsWholeDecimal<`${B}`> extends true
				? Within<`${B}`, IntegralLimitText[K][0], IntegralLimitText[K][1]>
				: false
			: K extends 'bigint'
				? IsWholeDecimal<`${B}`>
				: K extends 'float64' | 'number'
					? B extends bigint
						? NotAbove<Magnitude<`${B}`>, Float64ExactText>
						: true
					: K extends 'float32'
						? Float32Fits<`${B}`>
						: false

/**
 * `Min <= Max`. Bounds written in exponent form are not ordered at the type
 * level; `defineBounded` still orders them when the type is defined.
 */
type OrderedBounds<Min extends Bound, Max extends Bound> =
	IsPlainDecimal<`${Min}`> extends true
		? IsPlainDecimal<`${Max}`> extends true
			? CompareDecimal<`${Min}`, `${Max}`> extends 'gt'
				? false
				: true
			: true
		: true

/**
 * Whether kind `T` holds both bounds and the bounds are ordered. Only
 * literal bounds qualify.
 */
export type CanRepresentBounds<T, Min extends Bound, Max extends Bound> = [
	T
] extends [InputKind]
	? [BoundFits<T, Min>] extends [true]
		? [BoundFits<T, Max>] extends [true]
			? OrderedBounds<Min, Max>
			: false
		: false
	: false

export function isBound(value: unknown): value is Bound {
	return (
		typeof value === 'bigint' ||
		(typeof value === 'number' && Number.isFinite(value))
	)
}

function exactlyNumber(value: bigint): number | null {
	const n = Number(value)
	return Number.isFinite(n) && BigInt(n) === value ? n : null
}

/** Whether kind `kind` holds `bound` without overflow or loss. */
export function fitsKind(kind: InputKind, bound: Bound): boolean {
	const info = inputKindInfo(kind)

	if (info.category === 'integral') {
		if (!isWhole(bound)) return false
		if (info.lowest !== null && compareExact(bound, info.lowest) < 0) return false
		if (info.max !== null && compareExact(bound, info.max) > 0) return false
		return true
	}

	const n = typeof bound === 'bigint' ? exactlyNumber(bound) : bound
	if (n === null) return false
	if (kind === 'float32') {
		if (Math.abs(n) > FLOAT32_MAX) return false
		if (Number.isInteger(n) && Math.fround(n) !== n) return false
	}
	return true
}

/**
 * Runtime counterpart of `CanRepresentBounds`. Never throws: anything that
 * is not a known kind or a finite bound yields `false`.
 */
export function canRepresentBounds(
	kind: InputKind,
	min: Bound,
	max: Bound
): boolean {
	if (!isInputKind(kind) || !isBound(min) || !isBound(max)) return false
	return fitsKind(kind, min) && fitsKind(kind, max) && compareExact(min, max) <= 0
}
