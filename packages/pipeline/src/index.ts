/**
 * @rangefold/pipeline - Multi-stage remapping
 *
 * Stage parsing → StageMap[] → RemapPipeline fold
 */

export * from './errors';
export * from './parser';
export * from './pipeline';
export * from './almanac';
