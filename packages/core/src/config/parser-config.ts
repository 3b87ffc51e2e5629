/**
 * Parser Config Schema
 *
 * Single source of truth for magnet parser options, their types and defaults.
 */

import { LOG_LEVELS } from '../logging/logger'
import type { ConfigValueType } from './types'

// ============================================================================
// Schema Definition Types
// ============================================================================

interface BooleanConfigDef {
  type: 'boolean'
  default: boolean
}

interface NumberConfigDef {
  type: 'number'
  default: number
  min?: number
  max?: number
}

interface EnumConfigDef<T extends readonly string[]> {
  type: 'enum'
  values: T
  default: T[number]
}

type ConfigDef = BooleanConfigDef | NumberConfigDef | EnumConfigDef<readonly string[]>

// ============================================================================
// The Schema
// ============================================================================

export const parserConfigSchema = {
  /**
   * Reject links whose scheme is not "magnet" (compared case-insensitively).
   * Turn off when the rule sits behind a dispatcher that already chose the scheme.
   */
  requireMagnetScheme: {
    type: 'boolean',
    default: true,
  },

  /** Decode "+" in query keys and values as a space. */
  plusAsSpace: {
    type: 'boolean',
    default: true,
  },

  /** Lowest level the parser logs at. */
  logLevel: {
    type: 'enum',
    values: LOG_LEVELS,
    default: 'warn',
  },

  /** Initial size in bytes of decode buffers the package allocates itself. */
  decodeBufferCapacity: {
    type: 'number',
    default: 256,
    min: 16,
    max: 65536,
  },
} as const satisfies Record<string, ConfigDef>

// ============================================================================
// Derived Types
// ============================================================================

export type ParserConfigSchema = typeof parserConfigSchema
export type ParserConfigKey = keyof ParserConfigSchema

type ValueOf<D> = D extends { type: 'boolean' }
  ? boolean
  : D extends { type: 'number' }
    ? number
    : D extends { type: 'enum'; values: readonly (infer V)[] }
      ? V
      : never

export type ParserConfig = { [K in ParserConfigKey]: ValueOf<ParserConfigSchema[K]> }

// ============================================================================
// Helpers
// ============================================================================

export function getParserConfigType(key: ParserConfigKey): ConfigValueType {
  return parserConfigSchema[key].type
}

/** Get the default value for a config key */
export function getParserConfigDefault<K extends ParserConfigKey>(key: K): ParserConfig[K] {
  return getParserConfigDefaults()[key]
}

/** Get all defaults as an object */
export function getParserConfigDefaults(): ParserConfig {
  return {
    requireMagnetScheme: parserConfigSchema.requireMagnetScheme.default,
    plusAsSpace: parserConfigSchema.plusAsSpace.default,
    logLevel: parserConfigSchema.logLevel.default,
    decodeBufferCapacity: parserConfigSchema.decodeBufferCapacity.default,
  }
}

function coerceBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback
}

function coerceNumber(value: unknown, def: NumberConfigDef): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return def.default
  }
  let v = value
  if (def.min !== undefined) v = Math.max(def.min, v)
  if (def.max !== undefined) v = Math.min(def.max, v)
  return v
}

function coerceEnum<T extends string>(value: unknown, values: readonly T[], fallback: T): T {
  return values.find((v) => v === value) ?? fallback
}

/** Validate and coerce a value according to its schema, falling back to the default */
export function validateParserConfigValue<K extends ParserConfigKey>(key: K, value: unknown): ParserConfig[K] {
  const partial: Partial<Record<ParserConfigKey, unknown>> = {}
  partial[key] = value
  return resolveParserConfig(partial)[key]
}

/**
 * Fill in defaults and coerce every provided value.
 * Unknown keys are ignored; invalid values fall back to the default, numbers are clamped.
 */
export function resolveParserConfig(partial: Partial<Record<ParserConfigKey, unknown>> = {}): ParserConfig {
  const s = parserConfigSchema
  return {
    requireMagnetScheme: coerceBoolean(partial.requireMagnetScheme, s.requireMagnetScheme.default),
    plusAsSpace: coerceBoolean(partial.plusAsSpace, s.plusAsSpace.default),
    logLevel: coerceEnum(partial.logLevel, s.logLevel.values, s.logLevel.default),
    decodeBufferCapacity: coerceNumber(partial.decodeBufferCapacity, s.decodeBufferCapacity),
  }
}
