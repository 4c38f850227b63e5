/**
 * @cfdi-bundle/steps-package
 *
 * Submission archive assembly.
 *
 * @packageDocumentation
 */

export { assemblePackage, PACKAGE_STEP_ID } from './assemble-package.js';
export type { PackageConfig, PackageDeps, PackageHeader, PackageInput, PackageResult } from './assemble-package.js';
export { renderManifest, MANIFEST_TITLE, UNRESOLVED_MARKER } from './manifest.js';
export type { ManifestHeader, ManifestLine } from './manifest.js';
