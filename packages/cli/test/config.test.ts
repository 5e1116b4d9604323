import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { ConfigError } from '@lexcite/core'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
	configFilePaths,
	configFromEnv,
	loadConfigFile,
	mergeConfigInputs,
	parseConfigInput,
	resolveConfig,
	resolveLogLevel,
} from '../src/config.js'

describe('CLI Configuration', () => {
	let tempDir: string
	let cwd: string
	let home: string

	beforeEach(() => {
		tempDir = mkdtempSync(join(tmpdir(), 'lexcite-cli-'))
		cwd = join(tempDir, 'project')
		home = join(tempDir, 'home')
		mkdirSync(cwd)
		mkdirSync(join(home, '.lexcite'), { recursive: true })
	})

	afterEach(() => {
		rmSync(tempDir, { recursive: true, force: true })
	})

	describe('configFilePaths', () => {
		it('should look in the working directory, then the home directory', () => {
			expect(configFilePaths({ env: {}, cwd, home })).toEqual([
				join(cwd, '.lexcite.json'),
				join(cwd, '.lexcite.yaml'),
				join(home, '.lexcite', 'config.json'),
			])
		})

		it('should put an explicit path and LEXCITE_CONFIG first', () => {
			const paths = configFilePaths({ env: { LEXCITE_CONFIG: '/etc/lexcite.json' }, cwd, home, configPath: './mine.yaml' })

			expect(paths.slice(0, 2)).toEqual(['./mine.yaml', '/etc/lexcite.json'])
		})
	})

	describe('loadConfigFile', () => {
		it('should return null when no config file exists', () => {
			expect(loadConfigFile(configFilePaths({ env: {}, cwd, home }))).toBeNull()
		})

		it('should read YAML config files', () => {
			writeFileSync(join(cwd, '.lexcite.yaml'), 'indexDir: ./idx\nretrieval:\n  topK:\n    research: 4\n')

			expect(loadConfigFile(configFilePaths({ env: {}, cwd, home }))).toEqual({
				indexDir: './idx',
				chunking: {},
				embedding: {},
				retrieval: { topK: { research: 4 } },
				generation: { temperature: {} },
				ingestion: {},
			})
		})

		it('should prefer the JSON file in the working directory over the home config', () => {
			writeFileSync(join(cwd, '.lexcite.json'), JSON.stringify({ logsDir: './project-logs' }))
			writeFileSync(join(home, '.lexcite', 'config.json'), JSON.stringify({ logsDir: './home-logs' }))

			expect(loadConfigFile(configFilePaths({ env: {}, cwd, home }))?.logsDir).toBe('./project-logs')
		})

		it('should fail on a file that cannot be parsed', () => {
			const path = join(cwd, '.lexcite.json')
			writeFileSync(path, '{ "indexDir": ')

			expect(() => loadConfigFile([path])).toThrow(`Could not parse config file '${path}'`)
		})
	})

	describe('parseConfigInput', () => {
		it('should check the type of every known field', () => {
			expect(() => parseConfigInput([], 'x.json')).toThrow("Config file 'x.json' must contain an object.")
			expect(() => parseConfigInput({ chunking: { chunkSize: '800' } }, 'x.json')).toThrow("'chunkSize' in 'x.json' must be a number.")
			expect(() => parseConfigInput({ generation: 'fast' }, 'x.json')).toThrow("'generation' in 'x.json' must be an object.")
			expect(() => parseConfigInput({ embedding: { provider: 'bert' } }, 'x.json')).toThrow(
				"x.json: embedding.provider must be 'hashing' or 'openai', got 'bert'.",
			)
		})
	})

	describe('configFromEnv', () => {
		it('should read LEXCITE variables and fall back to the OpenAI ones', () => {
			const input = configFromEnv({
				LEXCITE_CHUNK_SIZE: '400',
				LEXCITE_MIN_CHUNK_SIZE: '',
				LEXCITE_RESEARCH_TEMPERATURE: '0.5',
				OPENAI_API_KEY: 'test-key',
				OPENAI_BASE_URL: 'http://localhost:8080/v1',
				LEXCITE_BASE_URL: 'http://localhost:9090/v1',
			})

			expect(input.chunking).toEqual({ chunkSize: 400 })
			expect(input.generation?.apiKey).toBe('test-key')
			expect(input.generation?.baseURL).toBe('http://localhost:9090/v1')
			expect(input.generation?.temperature).toEqual({ research: 0.5 })
		})

		it('should reject values that are not numbers', () => {
			expect(() => configFromEnv({ LEXCITE_CHUNK_SIZE: 'big' })).toThrow(new ConfigError("LEXCITE_CHUNK_SIZE must be a number, got 'big'."))
		})
	})

	describe('resolveConfig', () => {
		it('should layer overrides over the environment over the config file', () => {
			writeFileSync(join(cwd, '.lexcite.json'), JSON.stringify({
				indexDir: './from-file',
				logsDir: './logs-from-file',
				chunking: { chunkSize: 900 },
				generation: { model: 'file-model' },
			}))

			const config = resolveConfig({
				env: { LEXCITE_INDEX_DIR: './from-env', LEXCITE_LOGS_DIR: './logs-from-env' },
				cwd,
				home,
				overrides: { indexDir: './from-flag', logsDir: undefined },
			})

			expect(config.indexDir).toBe('./from-flag')
			expect(config.logsDir).toBe('./logs-from-env')
			expect(config.chunking).toEqual({ chunkSize: 900, minChunkSize: 600, overlap: 0.2 })
			expect(config.generation.model).toBe('file-model')
			expect(config.generation.maxRetries).toBe(2)
		})

		it('should validate the merged result', () => {
			expect(() => resolveConfig({ env: { LEXCITE_CHUNK_OVERLAP: '1.5' }, cwd, home })).toThrow(ConfigError)
		})
	})

	describe('mergeConfigInputs', () => {
		it('should merge nested sections and never overwrite with undefined', () => {
			const merged = mergeConfigInputs(
				{ generation: { model: 'a', temperature: { research: 0.2 } } },
				{ generation: { model: undefined, temperature: { judgment: 0.3 } } },
			)

			expect(merged.generation).toEqual({ model: 'a', temperature: { research: 0.2, judgment: 0.3 } })
		})
	})

	describe('resolveLogLevel', () => {
		it('should take the flag, then LEXCITE_LOG_LEVEL, then warn', () => {
			expect(resolveLogLevel('info', { LEXCITE_LOG_LEVEL: 'debug' })).toBe('info')
			expect(resolveLogLevel(undefined, { LEXCITE_LOG_LEVEL: 'debug' })).toBe('debug')
			expect(resolveLogLevel(undefined, {})).toBe('warn')
		})

		it('should reject unknown levels', () => {
			expect(() => resolveLogLevel('loud', {})).toThrow("Unknown log level 'loud'. Use debug, info, warn or error.")
		})
	})
})
