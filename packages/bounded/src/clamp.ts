import { InputCategoryError } from './errors'
import {
	inputKindInfo,
	kindInfo,
	type Bound,
	type InputKind,
	type StorageKind,
	type StorageOf
} from './kinds'
import { canRepresentBounds, categoryOf } from './predicates'
import { isScalar } from './scalar'

export interface ResolvedInput {
	readonly kind: InputKind
	readonly value: Bound
}

/** Saturates `value` into `[lo, hi]`. NaN saturates to `lo`. */
export function clampInto<R extends Bound>(value: R, lo: R, hi: R): R {
	if (typeof value === 'number' && Number.isNaN(value)) return lo
	if (value < lo) return lo
	if (value > hi) return hi
	return value
}

function describe(value: unknown): string {
	if (value === null) return 'null'
	if (typeof value === 'object') return 'object'
	return typeof value
}

/**
 * Works out the kind of an input and checks it against the storage
 * category: integral storage only takes integral inputs.
 */
export function resolveInput(
	storage: StorageKind,
	input: unknown
): ResolvedInput {
	const integralStorage = categoryOf(storage) === 'integral'

	if (typeof input === 'bigint') return { kind: 'bigint', value: input }

	if (typeof input === 'number') {
		if (!integralStorage) return { kind: 'number', value: input }
		if (!Number.isInteger(input)) {
			throw new InputCategoryError(
				storage,
				'number',
				`${input} is not an integer and cannot be stored as ${storage}`
			)
		}
		// whole numbers clamp in the exact integer domain
		return { kind: 'bigint', value: BigInt(input) }
	}

	if (isScalar(input)) {
		if (integralStorage && categoryOf(input.kind) !== 'integral') {
			throw new InputCategoryError(storage, input.kind)
		}
		return { kind: input.kind, value: input.value }
	}

	throw new InputCategoryError(
		storage,
		'unknown',
		`${describe(input)} is not a numeric input`
	)
}

/**
 * Folds an accepted input into `[min, max]` and returns it in the storage
 * representation.
 *
 * When the input's own kind can hold both bounds, the clamp runs in the
 * input's domain and only the clamped result is narrowed to storage, so a
 * huge input never passes through a narrowing cast. Otherwise the input is
 * cast to storage first and clamped there.
 */
export function clampToStorage<K extends StorageKind>(
	storage: K,
	min: Bound,
	max: Bound,
	input: ResolvedInput
): StorageOf<K> {
	const target = kindInfo(storage)

	if (canRepresentBounds(input.kind, min, max)) {
		const domain = inputKindInfo(input.kind)
		return target.cast(
			clampInto(domain.cast(input.value), domain.cast(min), domain.cast(max))
		)
	}

	return clampInto(target.cast(input.value), target.cast(min), target.cast(max))
}
