import { PACKAGE_ID_SEPARATOR } from '../constants/index.js';

/**
 * Helpers for daemon package ids of the form `name;version;arch;data`,
 * where `data` is usually the repository the package comes from.
 */

export interface PackageIdParts {
  name: string;
  version: string;
  arch: string;
  data: string;
}

export function parsePackageId(packageId: string): PackageIdParts {
  const [name = '', version = '', arch = '', ...rest] = packageId.split(PACKAGE_ID_SEPARATOR);
  return { name, version, arch, data: rest.join(PACKAGE_ID_SEPARATOR) };
}

export function packageName(packageId: string): string {
  return parsePackageId(packageId).name;
}

export function packageVersion(packageId: string): string {
  return parsePackageId(packageId).version;
}

export function packageArch(packageId: string): string {
  return parsePackageId(packageId).arch;
}

export function packageData(packageId: string): string {
  return parsePackageId(packageId).data;
}

/**
 * `name-version`, the form used in status lines while packages are updated.
 */
export function formatPackageLabel(packageId: string): string {
  const { name, version } = parsePackageId(packageId);
  return version ? `${name}-${version}` : name;
}
