/**
 * Derive the importable module name from a distribution name.
 *
 * @example toModuleName('storage-api') // 'storage_api'
 */
export function toModuleName(packageName: string): string {
  return packageName.replaceAll('-', '_');
}
