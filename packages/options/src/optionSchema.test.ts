import { describe, it, expect } from 'vitest'
import { InvalidOptionError } from '@buildplan/model'

import { OptionSchema } from './optionSchema.js'

const nameOption = { name: 'name', type: 'string', default: 'app', help: 'program name' }

describe('OptionSchema', () => {
  describe('declare', () => {
    it('rejects a second declaration of the same name', () => {
      const schema = new OptionSchema().declare(nameOption)
      expect(() => schema.declare(nameOption)).toThrow(InvalidOptionError)
    })

    it('rejects a malformed declaration', () => {
      expect(() => new OptionSchema().declare({ name: 'x', type: 'float', default: 1 })).toThrow(
        /invalid option 'x'/,
      )
    })

    it('rejects an enum default outside its values', () => {
      expect(() =>
        new OptionSchema().declare({
          name: 'mode',
          type: 'enum',
          values: ['debug', 'release'],
          default: 'fast',
        }),
      ).toThrow(`invalid option 'mode': default 'fast' is not one of its values`)
    })

    it('validates the default against the validator', () => {
      const schema = new OptionSchema()
      expect(() =>
        schema.declare({ name: 'jobs', type: 'string', default: 'x' }, (value) =>
          typeof value === 'string' && /^\d+$/.test(value) ? true : 'must be a number',
        ),
      ).toThrow(`invalid option 'jobs': must be a number`)
    })

    it('rejects a pattern that is not a regular expression', () => {
      expect(() =>
        new OptionSchema().declare({ name: 'p', type: 'string', default: '', pattern: '(' }),
      ).toThrow(InvalidOptionError)
    })
  })

  describe('resolve', () => {
    it('uses the declared default without overrides', () => {
      const options = OptionSchema.fromDeclarations([nameOption]).resolve()
      expect(options.get('name')).toBe('app')
      expect(options.layer('name')).toBe('default')
    })

    it('fails on an override of the wrong type', () => {
      const schema = OptionSchema.fromDeclarations([nameOption])
      expect(() => schema.resolve({ project: { name: 42 } })).toThrow(
        `invalid option 'name': expected a string, got number 42`,
      )
      expect(() => schema.resolve({ invocation: { name: ['a'] } })).toThrow(InvalidOptionError)
    })

    it('layers invocation over project over default', () => {
      const schema = OptionSchema.fromDeclarations([
        nameOption,
        { name: 'prefix', type: 'string', default: 'usr' },
      ])
      const options = schema.resolve({
        project: { name: 'proj', prefix: 'opt' },
        invocation: { name: 'cli' },
      })
      expect(options.string('name')).toBe('cli')
      expect(options.layer('name')).toBe('invocation')
      expect(options.string('prefix')).toBe('opt')
      expect(options.layer('prefix')).toBe('project')
    })

    it('ignores names inherited by the override objects', () => {
      const schema = OptionSchema.fromDeclarations([
        { name: 'constructor', type: 'string', default: 'app' },
        { name: 'toString', type: 'bool', default: true },
      ])
      const options = schema.resolve({ project: {}, invocation: {} })
      expect(options.string('constructor')).toBe('app')
      expect(options.layer('constructor')).toBe('default')
      expect(options.bool('toString')).toBe(true)

      const overridden = schema.resolve({ invocation: { toString: 'off' } })
      expect(overridden.bool('toString')).toBe(false)
      expect(overridden.layer('constructor')).toBe('default')
    })

    it('rejects overrides of undeclared options', () => {
      const schema = OptionSchema.fromDeclarations([nameOption])
      expect(() => schema.resolve({ invocation: { nmae: 'x' } })).toThrow(
        `invalid option 'nmae': unknown option in invocation overrides`,
      )
    })

    it('coerces command-line words for bool options', () => {
      const schema = OptionSchema.fromDeclarations([
        { name: 'tests', type: 'bool', default: false },
      ])
      expect(schema.resolve({ invocation: { tests: 'yes' } }).bool('tests')).toBe(true)
      expect(schema.resolve({ invocation: { tests: 'OFF' } }).bool('tests')).toBe(false)
      expect(() => schema.resolve({ invocation: { tests: 'maybe' } })).toThrow(
        `invalid option 'tests': expected a boolean, got 'maybe'`,
      )
    })

    it('does not coerce project values', () => {
      const schema = OptionSchema.fromDeclarations([
        { name: 'tests', type: 'bool', default: false },
      ])
      expect(() => schema.resolve({ project: { tests: 'yes' } })).toThrow(InvalidOptionError)
    })

    it('splits list options on commas', () => {
      const schema = OptionSchema.fromDeclarations([
        { name: 'warnings', type: 'list', default: ['-Wall'], pattern: '-W[a-z-]+' },
      ])
      const options = schema.resolve({ invocation: { warnings: '-Wall, -Wextra' } })
      expect(options.list('warnings')).toEqual(['-Wall', '-Wextra'])
      expect(Object.isFrozen(options.list('warnings'))).toBe(true)
      expect(() => schema.resolve({ invocation: { warnings: '-O2' } })).toThrow(
        `invalid option 'warnings': item '-O2' does not match /-W[a-z-]+/`,
      )
    })

    it('checks enum membership', () => {
      const schema = OptionSchema.fromDeclarations([
        { name: 'mode', type: 'enum', values: ['debug', 'release'], default: 'debug' },
      ])
      expect(schema.resolve({ invocation: { mode: 'release' } }).get('mode')).toBe('release')
      expect(() => schema.resolve({ invocation: { mode: 'fast' } })).toThrow(
        `invalid option 'mode': 'fast' is not one of debug, release`,
      )
    })

    it('runs validators on overrides', () => {
      const schema = new OptionSchema().declare(
        { name: 'name', type: 'string', default: 'app' },
        (value) => (value !== '' ? true : 'may not be empty'),
      )
      expect(() => schema.resolve({ invocation: { name: '' } })).toThrow(
        `invalid option 'name': may not be empty`,
      )
    })
  })

  describe('ResolvedOptions', () => {
    it('is frozen and refuses undeclared names', () => {
      const options = OptionSchema.fromDeclarations([nameOption]).resolve()
      expect(Object.isFrozen(options)).toBe(true)
      expect(() => options.get('missing')).toThrow(
        `invalid option 'missing': referenced but never declared`,
      )
      expect(() => options.bool('name')).toThrow(InvalidOptionError)
      expect(options.toJSON()).toEqual({ name: 'app' })
    })
  })
})
