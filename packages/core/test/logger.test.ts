import { afterEach, describe, expect, it, vi } from 'vitest'
import { ConsoleLogger, isLogLevel, NullLogger } from '../src/logger.js'

describe('ConsoleLogger', () => {
	afterEach(() => {
		vi.restoreAllMocks()
	})

	it('should prefix messages with their level', () => {
		const info = vi.spyOn(console, 'info').mockImplementation(() => {})
		new ConsoleLogger().info('Indexed 3 chunks')

		expect(info).toHaveBeenCalledWith('[INFO] Indexed 3 chunks')
	})

	it('should pass metadata only when there is some', () => {
		const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
		const logger = new ConsoleLogger()
		logger.warn('Skipping page', { page: 2 })
		logger.warn('No meta', {})

		expect(warn).toHaveBeenNthCalledWith(1, '[WARN] Skipping page', { page: 2 })
		expect(warn).toHaveBeenNthCalledWith(2, '[WARN] No meta')
	})

	it('should drop messages below the minimum level', () => {
		const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
		const error = vi.spyOn(console, 'error').mockImplementation(() => {})
		const logger = new ConsoleLogger({ level: 'warn' })
		logger.debug('hidden')
		logger.error('shown')

		expect(debug).not.toHaveBeenCalled()
		expect(error).toHaveBeenCalledWith('[ERROR] shown')
	})

	it('should write nothing through the NullLogger', () => {
		const log = vi.spyOn(console, 'error').mockImplementation(() => {})
		new NullLogger().error('ignored')

		expect(log).not.toHaveBeenCalled()
	})

	it('should recognize log levels', () => {
		expect(isLogLevel('debug')).toBe(true)
		expect(isLogLevel('verbose')).toBe(false)
	})
})
