/**
 * Manifest module - barrel exports
 */

export type { FindManifestOptions, ManifestRead, ManifestWrite } from './manifest.js';
export { findManifests, filterCandidates, readManifest, writeManifestVersion } from './manifest.js';
