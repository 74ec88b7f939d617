/**
 * Core types for rangefold
 */

import { z } from 'zod';
import { MAX_IDENTIFIER } from './domain';

// =============================================================================
// Identifiers
// =============================================================================

export const IdentifierSchema = z.number().int().nonnegative().max(MAX_IDENTIFIER);

export type Identifier = z.infer<typeof IdentifierSchema>;

// =============================================================================
// Segment Specification
// =============================================================================

/**
 * One `destination source length` triple, as read from a stage definition.
 */
export const SegmentSpecSchema = z.object({
  destinationStart: IdentifierSchema,
  sourceStart: IdentifierSchema,
  length: IdentifierSchema.positive(),
});

export type SegmentSpec = z.infer<typeof SegmentSpecSchema>;

// =============================================================================
// Intervals
// =============================================================================

/**
 * Half-open range `[start, end)`. Empty when `start >= end`.
 */
export const IntervalSchema = z.object({
  start: IdentifierSchema,
  end: IdentifierSchema,
});

export type Interval = z.infer<typeof IntervalSchema>;
