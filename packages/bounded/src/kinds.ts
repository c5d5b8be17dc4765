// ============================================================================
// Storage kinds
// ============================================================================

export const INTEGRAL_KINDS = [
	'int8',
	'uint8',
	'int16',
	'uint16',
	'int32',
	'uint32',
	'int64',
	'uint64'
] as const

export const FLOATING_KINDS = ['float32', 'float64'] as const

export const STORAGE_KINDS = [...INTEGRAL_KINDS, ...FLOATING_KINDS] as const

export type IntegralKind = (typeof INTEGRAL_KINDS)[number]
export type FloatingKind = (typeof FLOATING_KINDS)[number]
export type StorageKind = IntegralKind | FloatingKind

/**
 * Kinds an input value can carry. Besides the storage kinds, a plain
 * `bigint` is an unbounded integer and a plain `number` is a float64.
 */
export type InputKind = StorageKind | 'bigint' | 'number'

export type NumericCategory = 'integral' | 'floating'

/** Runtime representation of each storage kind. */
export interface StorageKindMap {
	int8: number
	uint8: number
	int16: number
	uint16: number
	int32: number
	uint32: number
	int64: bigint
	uint64: bigint
	float32: number
	float64: number
}

export type StorageOf<K extends StorageKind> = StorageKindMap[K]

/** A compile-time bound: a `number` or `bigint` literal. */
export type Bound = number | bigint

// ============================================================================
// Kind descriptors
// ============================================================================

export interface KindInfo<R extends Bound> {
	readonly category: NumericCategory
	/** Smallest representable value, or `null` when unbounded. */
	readonly lowest: R | null
	/** Largest representable value, or `null` when unbounded. */
	readonly max: R | null
	/** Converts like a C-style cast: integers wrap, floats round. */
	cast(value: Bound): R
}

export const FLOAT32_MAX = 3.4028234663852886e38

function toBigInt(value: Bound): bigint {
	return typeof value === 'bigint' ? value : BigInt(Math.trunc(value))
}

function smallInteger(bits: number, signed: boolean): KindInfo<number> {
	return {
		category: 'integral',
		lowest: signed ? -(2 ** (bits - 1)) : 0,
		max: signed ? 2 ** (bits - 1) - 1 : 2 ** bits - 1,
		cast: value =>
			Number(
				signed
					? BigInt.asIntN(bits, toBigInt(value))
					: BigInt.asUintN(bits, toBigInt(value))
			)
	}
}

function wideInteger(signed: boolean): KindInfo<bigint> {
	return {
		category: 'integral',
		lowest: signed ? -(2n ** 63n) : 0n,
		max: signed ? 2n ** 63n - 1n : 2n ** 64n - 1n,
		cast: value =>
			signed
				? BigInt.asIntN(64, toBigInt(value))
				: BigInt.asUintN(64, toBigInt(value))
	}
}

const float32: KindInfo<number> = {
	category: 'floating',
	lowest: -FLOAT32_MAX,
	max: FLOAT32_MAX,
	cast: value => Math.fround(Number(value))
}

const float64: KindInfo<number> = {
	category: 'floating',
	lowest: -Number.MAX_VALUE,
	max: Number.MAX_VALUE,
	cast: value => Number(value)
}

const unboundedInteger: KindInfo<bigint> = {
	category: 'integral',
	lowest: null,
	max: null,
	cast: toBigInt
}

type StorageKindTable = {
	[K in StorageKind]: KindInfo<StorageOf<K>>
}

export const KINDS: StorageKindTable = {
	int8: smallInteger(8, true),
	uint8: smallInteger(8, false),
	int16: smallInteger(16, true),
	uint16: smallInteger(16, false),
	int32: smallInteger(32, true),
	uint32: smallInteger(32, false),
	int64: wideInteger(true),
	uint64: wideInteger(false),
	float32,
	float64
}

export function kindInfo<K extends StorageKind>(
	kind: K
): KindInfo<StorageOf<K>> {
	return KINDS[kind]
}

export function inputKindInfo(kind: InputKind): KindInfo<Bound> {
	if (kind === 'bigint') return unboundedInteger
	if (kind === 'number') return float64
	return KINDS[kind]
}

export function isStorageKind(value: unknown): value is StorageKind {
	return STORAGE_KINDS.some(kind => kind === value)
}

export function isInputKind(value: unknown): value is InputKind {
	return value === 'bigint' || value === 'number' || isStorageKind(value)
}
