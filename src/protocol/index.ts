/**
 * Protocol layer exports for CTAPHID framing.
 */

export * from './constants';
export * from './commands';
export * from './responses';
export * from './packet';
export * from './init-packet';
export * from './cont-packet';
export * from './frames';
