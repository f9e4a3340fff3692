/**
 * @module commands
 * Re-exports all concrete Command implementations.
 */

export { PropertyCommand } from './property-command';
export type { PropertyCommandOptions } from './property-command';
export { CompoundCommand } from './compound-command';
