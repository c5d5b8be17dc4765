import * as v from 'valibot'
import { compareExact } from './decimal'
import { BoundsError } from './errors'
import { STORAGE_KINDS, type Bound, type StorageKind } from './kinds'
import { log } from './log'
import { canRepresentBounds } from './predicates'

// ============================================================================
// Schema
// ============================================================================

export const BoundSchema = v.union(
	[v.pipe(v.number(), v.finite()), v.bigint()],
	'bounds must be finite numbers or bigints'
)

export const BoundedDefinitionSchema = v.object({
	kind: v.picklist(STORAGE_KINDS, 'unknown storage kind'),
	min: BoundSchema,
	max: BoundSchema
})

export type BoundedDefinition = v.InferOutput<typeof BoundedDefinitionSchema>

// ============================================================================
// Validation
// ============================================================================

function reject(code: BoundsError['code'], message: string): never {
	log.debug('rejected definition:', message)
	throw new BoundsError(code, message)
}

function formatBounds(min: unknown, max: unknown): string {
	return `[${String(min)}, ${String(max)}]`
}

/**
 * Checks a kind/bounds triple once, when a bounded type is defined.
 * Throws `BoundsError` so an unusable definition fails at module load,
 * before any instance exists.
 */
export function validateDefinition(
	kind: unknown,
	min: unknown,
	max: unknown
): { kind: StorageKind; min: Bound; max: Bound } {
	const parsed = v.safeParse(BoundedDefinitionSchema, { kind, min, max })

	if (!parsed.success) {
		const [issue] = parsed.issues
		const path = v.getDotPath(issue)
		reject(
			path === 'kind' ? 'unknown_kind' : 'invalid_bound',
			`${issue.message}: ${String(kind)} ${formatBounds(min, max)}`
		)
	}

	const definition = parsed.output

	if (compareExact(definition.min, definition.max) > 0) {
		reject(
			'inverted_bounds',
			`min exceeds max: ${definition.kind} ${formatBounds(definition.min, definition.max)}`
		)
	}

	if (!canRepresentBounds(definition.kind, definition.min, definition.max)) {
		reject(
			'unrepresentable_bounds',
			`${definition.kind} cannot represent ${formatBounds(definition.min, definition.max)}`
		)
	}

	return definition
}
