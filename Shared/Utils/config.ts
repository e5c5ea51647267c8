/**
 * Environment variable helpers.
 * Every getter returns the fallback when the variable is unset or unparseable.
 */
import { homedir } from 'node:os';

export function expandPath(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return `${homedir()}${path.slice(1)}`;
  return path;
}

export function getEnvString(key: string): string | undefined;
export function getEnvString(key: string, defaultValue: string): string;
export function getEnvString(key: string, defaultValue?: string): string | undefined {
  const value = process.env[key];
  return value !== undefined ? value : defaultValue;
}

export function getEnvNumber(key: string): number | undefined;
export function getEnvNumber(key: string, defaultValue: number): number;
export function getEnvNumber(key: string, defaultValue?: number): number | undefined {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}
