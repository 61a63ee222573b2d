// Metadata file rendering for a prepared source distribution.

import type { DistributionManifest } from './types.js';

export const METADATA_VERSION = '1.1';

export function renderPkgInfo(manifest: DistributionManifest): string {
  const lines = [
    `Metadata-Version: ${METADATA_VERSION}`,
    `Name: ${manifest.name}`,
    `Version: ${manifest.version}`,
    `Summary: ${manifest.description || 'UNKNOWN'}`,
    `Home-page: ${manifest.url}`,
    `Author: ${manifest.author || 'UNKNOWN'}`,
    `Author-email: ${manifest.authorEmail || 'UNKNOWN'}`,
    `License: ${manifest.license || 'UNKNOWN'}`,
    ...manifest.classifiers.map((classifier) => `Classifier: ${classifier}`),
  ];
  return `${lines.join('\n')}\n`;
}
