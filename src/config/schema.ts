import { z } from 'zod';

export const DEFAULT_CLASSIFIERS = [
  'Development Status :: 3 - Alpha',
  'Intended Audience :: Developers',
  'Topic :: Utilities',
  'License :: OSI Approved :: Apache Software License',
];

export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  pretty: z.boolean().default(false),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const SourcesConfigSchema = z.object({
  /** Development marker: executable whose output is the version */
  versionScript: z.string().min(1).default('version.sh'),
  /** Metadata file of a prepared source distribution */
  metadataFile: z.string().min(1).default('PKG-INFO'),
});

export type SourcesConfig = z.infer<typeof SourcesConfigSchema>;

export const DistributionConfigSchema = z.object({
  description: z.string().default('Storage API library and command-line tool'),
  /** "{name}" is replaced by the resolved package name */
  urlTemplate: z.string().min(1).default('https://github.com/storage-tools/{name}'),
  author: z.string().default('Storage Tools Developers'),
  authorEmail: z.string().default('dev@storage-tools.example'),
  license: z.string().default('Apache-2.0'),
  classifiers: z.array(z.string().min(1)).default(() => [...DEFAULT_CLASSIFIERS]),
  installRequires: z.array(z.string().min(1)).default(() => []),
  // Exactly one data file glob and one script entry point per distribution
  dataFiles: z.array(z.string().min(1)).length(1).default(() => ['version.json']),
  scripts: z.array(z.string().min(1)).length(1).default(() => ['bin/storage']),
  /** A directory holding this file is a package */
  packageMarker: z.string().min(1).default('index.ts'),
  excludeDirs: z
    .array(z.string().min(1))
    .default(() => ['node_modules', 'dist', 'build', 'tests', 'test']),
});

export type DistributionConfig = z.infer<typeof DistributionConfigSchema>;

export const ConfigSchema = z.object({
  logging: LoggingConfigSchema.default(() => ({ level: 'info' as const, pretty: false })),

  sources: SourcesConfigSchema.default(() => ({
    versionScript: 'version.sh',
    metadataFile: 'PKG-INFO',
  })),

  // Registration fields written into the manifest
  distribution: DistributionConfigSchema.default(() => DistributionConfigSchema.parse({})),
});

export type Config = z.infer<typeof ConfigSchema>;
