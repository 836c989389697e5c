/**
 * Custodia DTO package public surface.
 * Re-exports stable enums, reason codes and the records shared by the engines.
 */
export * from './enums';
export * from './reasons';
export * from './types';
