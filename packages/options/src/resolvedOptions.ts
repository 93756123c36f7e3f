import { InvalidOptionError } from '@buildplan/model'

import { OptionValue } from './schema.js'

export type OptionLayer = 'default' | 'project' | 'invocation'

interface Entry {
  readonly value: OptionValue
  readonly layer: OptionLayer
}

/** Read-only view of the option values for one evaluation. */
export class ResolvedOptions {
  private readonly values: ReadonlyMap<string, Entry>

  constructor(values: Map<string, Entry>) {
    this.values = new Map(values)
    Object.freeze(this)
  }

  public static empty(): ResolvedOptions {
    return new ResolvedOptions(new Map())
  }

  public has(name: string): boolean {
    return this.values.has(name)
  }

  public get(name: string): OptionValue {
    const entry = this.values.get(name)
    if (!entry) {
      throw new InvalidOptionError(name, 'referenced but never declared')
    }
    return entry.value
  }

  public layer(name: string): OptionLayer | undefined {
    return this.values.get(name)?.layer
  }

  public string(name: string): string {
    const value = this.get(name)
    if (typeof value !== 'string') {
      throw new InvalidOptionError(name, 'is not a string option')
    }
    return value
  }

  public bool(name: string): boolean {
    const value = this.get(name)
    if (typeof value !== 'boolean') {
      throw new InvalidOptionError(name, 'is not a bool option')
    }
    return value
  }

  public list(name: string): readonly string[] {
    const value = this.get(name)
    if (typeof value === 'string' || typeof value === 'boolean') {
      throw new InvalidOptionError(name, 'is not a list option')
    }
    return value
  }

  public entries(): Array<[string, OptionValue]> {
    return [...this.values].map(([name, entry]) => [name, entry.value])
  }

  public toJSON(): Record<string, OptionValue> {
    return Object.fromEntries(this.entries())
  }
}
