export {
  formatBytes,
  InvalidByteSizeError,
  parseBytes,
  type ByteUnitSystem,
} from './bytes.js';
export { formatDuration } from './duration.js';

export function stringifyJSONSafe(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return;
  }
}
