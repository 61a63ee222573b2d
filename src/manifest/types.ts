// Distribution manifest: the registration metadata handed to the packaging toolchain.

export interface DistributionManifest {
  name: string;
  version: string;
  description: string;
  url: string;
  author: string;
  authorEmail: string;
  license: string;
  classifiers: string[];
  /** Package directories relative to the project root, `/`-joined */
  packages: string[];
  installRequires: string[];
  /** Data file globs bundled with each module */
  packageData: Record<string, string[]>;
  /** Installable script paths relative to the project root */
  scripts: string[];
}

/** Contents of the bundled version.json data file */
export interface VersionFile {
  name: string;
  version: string;
}
