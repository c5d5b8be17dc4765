import * as v from 'valibot'

// ============================================================================
// Schema
// ============================================================================

const Flag = v.pipe(
	v.string(),
	v.trim(),
	v.toLowerCase(),
	v.transform(value => value === '1' || value === 'true' || value === 'yes')
)

const EnvSchema = v.object({
	/** Log bounded-type definitions and rejections to the console. */
	BOUNDED_DEBUG: v.optional(Flag, 'false')
})

// ============================================================================
// Parse & export
// ============================================================================

export type Env = v.InferOutput<typeof EnvSchema>

export function parseEnv(source: Record<string, string | undefined>): Env {
	return v.parse(EnvSchema, {
		BOUNDED_DEBUG: source.BOUNDED_DEBUG
	})
}

/**
 * Validated environment.
 *
 * Parsed eagerly on first import; throws a ValiError if a variable is
 * malformed.
 */
export const env: Env = parseEnv(process.env)
