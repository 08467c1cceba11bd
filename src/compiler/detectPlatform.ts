import type { MachineInfo } from './compilerTypes.js';

export function detectMachine(
  platform: NodeJS.Platform = process.platform,
): MachineInfo {
  return {
    system: platform,
    isWindowsLike: () => platform === 'win32',
  };
}
