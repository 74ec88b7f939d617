/**
 * @rangefold/core - Piecewise range remapping primitives
 *
 * - Domain: unsigned 32-bit identifiers, saturating arithmetic
 * - Segment: one source range bound to one destination range
 * - StageMap: ordered segments with identity fallback
 */

export * from './domain';
export * from './types';
export * from './interval';
export * from './segment';
export * from './stage-map';
