import { env } from '@boundnum/env'

export interface DebugLog {
	debug(...args: unknown[]): void
}

export function createLog(enabled: boolean, tag = 'bounded'): DebugLog {
	return {
		debug: (...args) => {
			if (enabled) console.debug(`[${tag}]`, ...args)
		}
	}
}

export const log = createLog(env.BOUNDED_DEBUG)
