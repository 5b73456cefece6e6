/**
 * Binary Configuration
 * 
 * Centralized configuration for all external binary paths.
 * 
 * Priority order:
 * 1. Environment variables (e.g., FFMPEG_PATH)
 * 2. System PATH
 */

import { existsSync } from 'node:fs';

export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
  fromEnv: boolean;
}

export interface BinariesConfig {
  ffmpeg: BinaryConfig;
  ffprobe: BinaryConfig;
  ssh: BinaryConfig;
  scp: BinaryConfig;
  sshpass: BinaryConfig;
}

export type BinaryName = keyof BinariesConfig;

function resolveBinaryPath(name: string, envVar: string): BinaryConfig {
  const envPath = process.env[envVar];
  if (envPath && existsSync(envPath)) {
    return { name, envVar, resolvedPath: envPath, fromEnv: true };
  }

  // Let the system PATH resolve it; a missing binary fails at spawn time
  const exeName = process.platform === 'win32' ? `${name}.exe` : name;
  return { name, envVar, resolvedPath: exeName, fromEnv: false };
}

/**
 * Get all binary configurations
 */
export function getBinariesConfig(): BinariesConfig {
  return {
    ffmpeg: resolveBinaryPath('ffmpeg', 'FFMPEG_PATH'),
    ffprobe: resolveBinaryPath('ffprobe', 'FFPROBE_PATH'),
    ssh: resolveBinaryPath('ssh', 'SSH_PATH'),
    scp: resolveBinaryPath('scp', 'SCP_PATH'),
    sshpass: resolveBinaryPath('sshpass', 'SSHPASS_PATH'),
  };
}

// Singleton instance
let _binaries: BinariesConfig | null = null;

/**
 * Get binary configurations (cached)
 */
export function binaries(): BinariesConfig {
  if (!_binaries) {
    _binaries = getBinariesConfig();
  }
  return _binaries;
}

/**
 * Get a specific binary path
 */
export function getBinaryPath(name: BinaryName): string {
  return binaries()[name].resolvedPath;
}
