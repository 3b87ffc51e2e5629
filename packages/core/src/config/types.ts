/**
 * Config Module Types
 */

/** Kind of value a config key holds */
export type ConfigValueType = 'boolean' | 'number' | 'enum'
