import type { InputKind, StorageKind } from './kinds'

export type BoundsErrorCode =
	| 'unknown_kind'
	| 'invalid_bound'
	| 'inverted_bounds'
	| 'unrepresentable_bounds'

/** Thrown by `defineBounded` when a kind/bounds triple is not usable. */
export class BoundsError extends Error {
	readonly code: BoundsErrorCode

	constructor(code: BoundsErrorCode, message: string) {
		super(message)
		this.code = code
		this.name = 'BoundsError'
	}
}

/**
 * Thrown when an input of the wrong numeric category (or not a number at
 * all) reaches a bounded value from untyped code. Out-of-range values are
 * never an error; they are clamped.
 */
export class InputCategoryError extends TypeError {
	readonly storage: StorageKind
	readonly input: InputKind | 'unknown'

	constructor(storage: StorageKind, input: InputKind | 'unknown', detail?: string) {
		super(detail ?? `${input} input cannot be stored as ${storage}`)
		this.storage = storage
		this.input = input
		this.name = 'InputCategoryError'
	}
}
