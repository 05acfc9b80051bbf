/**
 * Core layout engine: synchronous and free of Effect
 */

export * from './types';
export * from './host';
export * from './config';
export * from './geometry';
export * from './layout-state';
export * from './scheduling';
export { WrappedWindow } from './wrapped-window';
export { Region } from './region';
export type { RegionOptions } from './region';
export { Display } from './display';
export * from './operations/init';
export * from './operations/find';
export * from './operations/events';
export * from './operations/actions';
