/**
 * @fileoverview Describe where an npm-installed backend lives.
 *
 * This module never downloads or runs anything. It computes the install and
 * bin directories for a backend under an explicit base install directory,
 * reports whether its binaries are present, and renders the shell script an
 * external installer would run.
 *
 * @module installer-info
 */

import { z } from 'zod';
import { InstallerConfigError } from './errors.js';
import { pathUtils, type PathUtils } from './utils/path-utils.js';

/** npm package spec: optional scope, name, optional version/range tag. */
const NPM_PACKAGE_PATTERN = /^(?:@[\w.-]+\/)?[\w.-]+(?:@[\w.^~*-]+)?$/;

/** Server names become directory names. */
const SERVER_NAME_PATTERN = /^[\w.-]+$/;

const BINARY_NAME_PATTERN = /^[\w.-]+$/;

const npmInstallerSchema = z.object({
  baseInstallDir: z.string().trim().min(1),
  serverName: z.string().regex(SERVER_NAME_PATTERN, 'Invalid server name'),
  packages: z.array(z.string().regex(NPM_PACKAGE_PATTERN, 'Invalid npm package name')).nonempty(),
  binaries: z.array(z.string().regex(BINARY_NAME_PATTERN, 'Invalid binary name')).nonempty(),
  postInstallScript: z.string().optional(),
});

export type NpmInstallerConfig = z.input<typeof npmInstallerSchema>;

export interface InstallInfo {
  installDir: string;
  binDir: string;
  /** Binary name → absolute path inside binDir */
  binaries: Record<string, string>;
  isInstalled: boolean;
}

export interface NpmInstaller {
  readonly serverName: string;
  /** Snapshot of paths and installed state. */
  info(): InstallInfo;
  /** Shell script that installs the packages into installDir. */
  renderInstallScript(): string;
}

const INSTALL_SCRIPT_TEMPLATE = [
  'set -e',
  'mkdir -p "{{install_dir}}"',
  'cd "{{install_dir}}"',
  'npm install {{packages}}',
  '{{post_install_script}}',
  '',
].join('\n');

function renderTemplate(template: string, params: Record<string, string>): string {
  return template.replace(/\{\{(\S+?)\}\}/g, (match, key: string) => params[key] ?? match);
}

/**
 * Build the installer description for one backend.
 *
 * @throws InstallerConfigError when the description is invalid
 */
export function createNpmInstallerInfo(config: NpmInstallerConfig, paths: PathUtils = pathUtils): NpmInstaller {
  const result = npmInstallerSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new InstallerConfigError(`Invalid installer config: ${issues.join('; ')}`, issues);
  }
  const { baseInstallDir, serverName, packages, binaries, postInstallScript } = result.data;

  const installDir = paths.join(baseInstallDir, serverName);
  const binDir = paths.join(installDir, 'node_modules', '.bin');
  const binaryPaths = Object.fromEntries(binaries.map((name) => [name, paths.join(binDir, name)]));

  return {
    serverName,
    info() {
      return {
        installDir,
        binDir,
        binaries: { ...binaryPaths },
        isInstalled: Object.values(binaryPaths).every((binPath) => paths.fs.isExecutable(binPath)),
      };
    },
    renderInstallScript() {
      return renderTemplate(INSTALL_SCRIPT_TEMPLATE, {
        install_dir: installDir,
        packages: packages.join(' '),
        post_install_script: postInstallScript ?? '',
      });
    },
  };
}

/**
 * Marketplace download URL for a `publisher.extension` identifier.
 *
 * @throws InstallerConfigError when the identifier has no publisher or extension part
 */
export function formatVsPackageUrl(extensionName: string): string {
  const [publisher, extension] = extensionName.split('.');
  if (!publisher || !extension) {
    throw new InstallerConfigError(`Expected "publisher.extension", got "${extensionName}"`);
  }
  return `https://marketplace.visualstudio.com/_apis/public/gallery/publishers/${publisher}/vsextensions/${extension}/latest/vspackage`;
}
