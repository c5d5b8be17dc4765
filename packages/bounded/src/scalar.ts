import {
	KINDS,
	isStorageKind,
	type StorageKind,
	type StorageOf
} from './kinds'

/**
 * A number tagged with the storage kind it belongs to. Lets callers pass
 * e.g. a uint64 or a float32 where a plain `number` would lose that
 * information.
 */
export interface Scalar<K extends StorageKind = StorageKind> {
	readonly kind: K
	readonly value: StorageOf<K>
}

export type AnyScalar = { [K in StorageKind]: Scalar<K> }[StorageKind]

function isMember(kind: StorageKind, value: number | bigint): boolean {
	const info = KINDS[kind]
	if (kind === 'float64') return typeof value === 'number'
	if (kind === 'float32') {
		return (
			typeof value === 'number' &&
			(Number.isNaN(value) || Math.fround(value) === value)
		)
	}
	if (kind === 'int64' || kind === 'uint64') {
		return (
			typeof value === 'bigint' &&
			info.lowest !== null &&
			info.max !== null &&
			value >= info.lowest &&
			value <= info.max
		)
	}
	return (
		typeof value === 'number' &&
		Number.isInteger(value) &&
		info.lowest !== null &&
		info.max !== null &&
		value >= info.lowest &&
		value <= info.max
	)
}

function create<K extends StorageKind>(kind: K) {
	return (value: StorageOf<K>): Scalar<K> => {
		if (!isMember(kind, value)) {
			throw new RangeError(`${String(value)} is not a valid ${kind} value`)
		}
		return Object.freeze({ kind, value })
	}
}

export const scalar = {
	int8: create('int8'),
	uint8: create('uint8'),
	int16: create('int16'),
	uint16: create('uint16'),
	int32: create('int32'),
	uint32: create('uint32'),
	int64: create('int64'),
	uint64: create('uint64'),
	float32: create('float32'),
	float64: create('float64')
}

/** Extreme values of each kind, as scalars. */
export const limits = {
	lowest<K extends StorageKind>(kind: K): Scalar<K> {
		return limitScalar(kind, 'lowest')
	},
	max<K extends StorageKind>(kind: K): Scalar<K> {
		return limitScalar(kind, 'max')
	}
}

function limitScalar<K extends StorageKind>(
	kind: K,
	end: 'lowest' | 'max'
): Scalar<K> {
	const value = KINDS[kind][end]
	if (value === null) throw new RangeError(`${kind} is unbounded`)
	return Object.freeze({ kind, value })
}

export function isScalar(value: unknown): value is AnyScalar {
	if (typeof value !== 'object' || value === null) return false
	if (!('kind' in value) || !('value' in value)) return false
	const { kind, value: inner } = value
	return (
		isStorageKind(kind) &&
		(typeof inner === 'number' || typeof inner === 'bigint') &&
		isMember(kind, inner)
	)
}
