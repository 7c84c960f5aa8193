import { join } from 'path';

/** `<outputDir>/<prefix>-<version>-win32.zip` */
export function zipArtifactPath(outputDir: string, prefix: string, version: string): string {
  return join(outputDir, `${prefix}-${version}-win32.zip`);
}

/** `<outputDir>/<prefix>-<version>-installer.exe` */
export function installerArtifactPath(outputDir: string, prefix: string, version: string): string {
  return join(outputDir, `${prefix}-${version}-installer.exe`);
}
