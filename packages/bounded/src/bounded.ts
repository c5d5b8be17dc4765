import { clampToStorage, resolveInput } from './clamp'
import type { CompareDecimal, IsLiteral, IsPlainDecimal } from './decimal'
import { validateDefinition } from './definition'
import type {
	Bound,
	IntegralKind,
	StorageKind,
	StorageOf
} from './kinds'
import { log } from './log'
import type {
	CanRepresentBounds,
	CategoryOf,
	SameNumericCategory
} from './predicates'
import type { AnyScalar, Scalar } from './scalar'

// ============================================================================
// Input gate
// ============================================================================

/** Anything a bounded value can be constructed or assigned from. */
export type NumericInput = number | bigint | AnyScalar

declare const rejected: unique symbol

/**
 * Parameter type of a call the type checker refuses. The reason shows up
 * in the error message.
 */
export interface Rejected<Reason extends string> {
	readonly [rejected]: Reason
}

/**
 * Whole-number `number` types (`10`, `-3`, `1e+21`) count as integral;
 * fractional literals and plain `number` count as floating-point.
 */
type IsWholeNumberType<V extends number> = number extends V
	? false
	: `${V}` extends `${string}.${string}` | `${string}e-${string}`
		? false
		: true

export type InputCategory<V> =
	V extends Scalar<infer K extends StorageKind>
		? CategoryOf<K>
		: V extends bigint
			? 'integral'
			: V extends number
				? IsWholeNumberType<V> extends true
					? 'integral'
					: 'floating'
				: never

/**
 * Integral inputs are accepted everywhere; floating-point inputs only by
 * floating-point storage.
 */
export type AcceptInput<K extends StorageKind, V> = [InputCategory<V>] extends [
	'integral'
]
	? unknown
	: SameNumericCategory<K, InputCategory<V>> extends true
		? unknown
		: CategoryOf<K> extends 'floating'
			? unknown
			: Rejected<`floating-point input cannot be stored as ${K}`>

export type BoundsGate<
	K extends StorageKind,
	Min extends Bound,
	Max extends Bound
> =
	CanRepresentBounds<K, Min, Max> extends true
		? unknown
		: Rejected<`${K} cannot represent these bounds`>

// ============================================================================
// Bounded values
// ============================================================================

export interface BoundedValue<
	K extends StorageKind,
	Min extends Bound,
	Max extends Bound
> {
	readonly kind: K
	readonly min: Min
	readonly max: Max
	/** Current value, always within `[min, max]`. */
	readonly value: StorageOf<K>
	/** Clamps `input` into the bounds and stores it. */
	set<V extends NumericInput>(input: V & AcceptInput<K, V>): void
	/** Same bounded type and same value. */
	equals(other: BoundedValue<K, Min, Max>): boolean
	valueOf(): StorageOf<K>
	toString(): string
	/** 64-bit kinds serialise as decimal strings. */
	toJSON(): number | string
}

export interface BoundedType<
	K extends StorageKind,
	Min extends Bound,
	Max extends Bound
> {
	new <V extends NumericInput>(
		input: V & AcceptInput<K, V>
	): BoundedValue<K, Min, Max>
	readonly kind: K
	readonly min: Min
	readonly max: Max
	of<V extends NumericInput>(
		input: V & AcceptInput<K, V>
	): BoundedValue<K, Min, Max>
	/**
	 * Entry point for untyped input. Applies the category gate at run time
	 * and throws `InputCategoryError` where the type checker would have
	 * refused the call.
	 */
	parse(input: unknown): BoundedValue<K, Min, Max>
	/** The clamped storage value, without an instance. */
	clamp<V extends NumericInput>(input: V & AcceptInput<K, V>): StorageOf<K>
	is(value: unknown): value is BoundedValue<K, Min, Max>
}

export type BoundedOf<T> =
	T extends BoundedType<
		infer K extends StorageKind,
		infer Min extends Bound,
		infer Max extends Bound
	>
		? BoundedValue<K, Min, Max>
		: never

/**
 * Defines a bounded numeric type over storage kind `kind` and the closed
 * interval `[min, max]`.
 *
 * ```ts
 * const Decibels = defineBounded('float64', -100, 0)
 * Decibels.of(12).value // 0
 * ```
 *
 * Bounds the kind cannot hold, or `min > max`, fail to type-check. The
 * same check runs once here and throws `BoundsError` for callers the type
 * checker did not see.
 */
export function defineBounded<
	K extends StorageKind,
	Min extends Bound,
	Max extends Bound
>(
	kind: K,
	min: Min & BoundsGate<K, Min, Max>,
	max: Max
): BoundedType<K, Min, Max> {
	validateDefinition(kind, min, max)
	log.debug(`defined ${kind} [${String(min)}, ${String(max)}]`)

	const lower: Min = min

	function clamp(input: unknown): StorageOf<K> {
		return clampToStorage(kind, lower, max, resolveInput(kind, input))
	}

	class BoundedNumber implements BoundedValue<K, Min, Max> {
		static readonly kind = kind
		static readonly min = lower
		static readonly max = max

		static of(input: unknown): BoundedNumber {
			return new BoundedNumber(input)
		}

		static parse(input: unknown): BoundedNumber {
			return new BoundedNumber(input)
		}

		static clamp(input: unknown): StorageOf<K> {
			return clamp(input)
		}

		static is(value: unknown): value is BoundedNumber {
			return value instanceof BoundedNumber
		}

		#value: StorageOf<K>

		constructor(input: unknown) {
			this.#value = clamp(input)
		}

		get kind(): K {
			return kind
		}

		get min(): Min {
			return lower
		}

		get max(): Max {
			return max
		}

		get value(): StorageOf<K> {
			return this.#value
		}

		set(input: unknown): void {
			if (Object.isFrozen(this)) {
				throw new TypeError('Cannot assign to a constant bounded value')
			}
			this.#value = clamp(input)
		}

		equals(other: BoundedValue<K, Min, Max>): boolean {
			return other instanceof BoundedNumber && other.#value === this.#value
		}

		valueOf(): StorageOf<K> {
			return this.#value
		}

		toString(): string {
			return String(this.#value)
		}

		toJSON(): number | string {
			const value: Bound = this.#value
			return typeof value === 'bigint' ? value.toString() : value
		}
	}

	return BoundedNumber
}

// ============================================================================
// Literal construction
// ============================================================================

export type WholeLiteralGate<N extends Bound> =
	IsLiteral<N> extends true
		? N extends bigint
			? unknown
			: N extends number
				? IsWholeNumberType<N> extends true
					? unknown
					: Rejected<'only whole-number literals can build a bounded value'>
				: never
		: Rejected<'expected a number or bigint literal'>

type ParseStorage<K extends StorageKind, S extends string> =
	StorageOf<K> extends bigint
		? S extends `${infer X extends bigint}`
			? X
			: bigint
		: S extends `${infer X extends number}`
			? X
			: number

type ClampText<S extends string, Lo extends string, Hi extends string> =
	S extends `-${string}e+${string}`
		? Lo
		: S extends `${string}e+${string}`
			? Hi
			: IsPlainDecimal<S> extends false
				? string
				: CompareDecimal<S, Lo> extends 'lt'
					? Lo
					: CompareDecimal<S, Hi> extends 'gt'
						? Hi
						: S

/** The value a whole literal `N` clamps to, as a literal type. */
export type ClampedLiteral<
	K extends StorageKind,
	N extends Bound,
	Min extends Bound,
	Max extends Bound
> = ParseStorage<K, ClampText<`${N}`, `${Min}`, `${Max}`>>

/** A frozen bounded value whose `value` type is known exactly. */
export type ConstBounded<
	K extends StorageKind,
	Min extends Bound,
	Max extends Bound,
	V = unknown
> = Omit<BoundedValue<K, Min, Max>, 'set' | 'value'> & {
	readonly value: StorageOf<K> & V
}

/**
 * Builds a helper that turns whole-number literals into constant bounded
 * values of an integral type. Fractional literals do not type-check.
 *
 * ```ts
 * const steps = literal(DecibelSteps)
 * steps(5000).value // typed and valued as 1000
 * ```
 */
export function literal<
	K extends IntegralKind,
	Min extends Bound,
	Max extends Bound
>(type: BoundedType<K, Min, Max>) {
	function construct<N extends Bound>(
		n: N & WholeLiteralGate<N>
	): ConstBounded<K, Min, Max, ClampedLiteral<K, N, Min, Max>>
	function construct(n: Bound): ConstBounded<K, Min, Max> {
		return Object.freeze(type.parse(n))
	}
	return construct
}

export type LiteralFactory<
	K extends IntegralKind,
	Min extends Bound,
	Max extends Bound
> = ReturnType<typeof literal<K, Min, Max>>
