/**
 * Types Index
 *
 * Re-exports all types from domain-specific files.
 */

export * from './parser'
