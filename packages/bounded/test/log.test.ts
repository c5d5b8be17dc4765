import { afterEach, describe, expect, it, vi } from 'vitest'
import { createLog } from '../src/log'

describe('createLog', () => {
	afterEach(() => {
		vi.restoreAllMocks()
	})

	it('writes tagged debug lines when enabled', () => {
		const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
		createLog(true).debug('defined int8 [0, 10]')
		expect(debug).toHaveBeenCalledWith('[bounded]', 'defined int8 [0, 10]')
	})

	it('takes a custom tag', () => {
		const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
		createLog(true, 'levels').debug('ready', 3)
		expect(debug).toHaveBeenCalledWith('[levels]', 'ready', 3)
	})

	it('stays quiet when disabled', () => {
		const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
		createLog(false).debug('defined int8 [0, 10]')
		expect(debug).not.toHaveBeenCalled()
	})
})
