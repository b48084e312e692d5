/**
 * Domain Types - Central export
 */

export * from './result';
export * from './secrets';
export * from './workloads';
export * from './report';
export * from './snapshot';
