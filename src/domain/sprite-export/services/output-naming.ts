import { fileExtensionFor, type OutputFormat } from '../value-objects/export-options.js';

const UNSAFE_NAME_CHARACTERS = /[|:*?<>"/\\]/g;
const MIN_INDEX_DIGITS = 4;

export function sanitizeOutputName(name: string): string {
  const cleaned = name.trim().replace(UNSAFE_NAME_CHARACTERS, '_');
  return cleaned.length > 0 ? cleaned : 'animation';
}

export function frameIndexDigits(frameCount: number): number {
  const maxIndex = Math.max(0, frameCount - 1);
  return Math.max(MIN_INDEX_DIGITS, String(maxIndex).length);
}

export function frameFileName(
  name: string,
  index: number,
  frameCount: number,
  format: OutputFormat,
): string {
  const padded = String(index).padStart(frameIndexDigits(frameCount), '0');
  return `${name}_${padded}.${fileExtensionFor(format)}`;
}

export function sheetFileName(name: string, format: OutputFormat): string {
  return `${name}_sheet.${fileExtensionFor(format)}`;
}
