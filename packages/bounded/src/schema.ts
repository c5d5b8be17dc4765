import * as v from 'valibot'
import type { BoundedType, BoundedValue } from './bounded'
import { categoryOf } from './predicates'
import type { Bound, StorageKind } from './kinds'

/**
 * Valibot schema that parses a `number` or `bigint` into a bounded value.
 *
 * Out-of-range input is clamped, never reported. For integral storage,
 * fractional numbers are an issue rather than a thrown error.
 *
 * ```ts
 * const VolumeSchema = boundedSchema(DecibelSteps)
 * v.parse(VolumeSchema, 5000).value // 1000
 * ```
 */
export function boundedSchema<
	K extends StorageKind,
	Min extends Bound,
	Max extends Bound
>(type: BoundedType<K, Min, Max>) {
	const integral = categoryOf(type.kind) === 'integral'

	return v.pipe(
		v.union(
			[v.number(), v.bigint()],
			`expected a number or bigint for ${type.kind} [${String(type.min)}, ${String(type.max)}]`
		),
		v.check(
			input => !integral || typeof input === 'bigint' || Number.isInteger(input),
			`expected an integer for ${type.kind} storage`
		),
		v.transform((input): BoundedValue<K, Min, Max> => type.parse(input))
	)
}
