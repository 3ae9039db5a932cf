/**
 * BIDS (Brain Imaging Data Structure) sidecar ingest
 *
 * Reconciles events, electrodes, ICA and annotation sidecars with a loaded
 * recording.
 */

export * from './tableLoader';
export * from './electrodes';
export * from './events';
export * from './ica';
export * from './annotations';
export * from './recording';
export * from './ingest';
