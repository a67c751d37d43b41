export type PlatformInfo = {
  platform: NodeJS.Platform;
  arch: string;
  isWindows: boolean;
  isMac: boolean;
  isLinux: boolean;
  /** Separator between entries of PATH-like strings. */
  pathDelimiter: ':' | ';';
};

export function detectPlatform(): PlatformInfo {
  return platformInfo(process.platform, process.arch);
}

export function platformInfo(platform: NodeJS.Platform, arch: string = process.arch): PlatformInfo {
  const isWindows = platform === 'win32';
  return {
    platform,
    arch,
    isWindows,
    isMac: platform === 'darwin',
    isLinux: platform === 'linux',
    pathDelimiter: isWindows ? ';' : ':',
  };
}
