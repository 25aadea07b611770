import { JsonValue } from '../common/json';
import { CanonicalStatus, NormalizedStatus } from './types/status.types';

const STATUS_ALIASES: ReadonlyMap<string, CanonicalStatus> = new Map([
  ['success', CanonicalStatus.COMPLETED],
  ['completed', CanonicalStatus.COMPLETED],
  ['failed', CanonicalStatus.FAILED],
  ['reversed', CanonicalStatus.FAILED],
  ['pending', CanonicalStatus.PENDING],
  ['inprogress', CanonicalStatus.PENDING],
  ['processing', CanonicalStatus.PENDING],
]);

// Falsy statuses (absent, null, false, 0, '') carry no information.
export function normalizeStatus(rawStatus: JsonValue | undefined): NormalizedStatus {
  if (!rawStatus) {
    return { kind: 'known', status: CanonicalStatus.UNKNOWN };
  }

  const text = typeof rawStatus === 'string' ? rawStatus : JSON.stringify(rawStatus);
  const key = text.trim().toLowerCase();

  if (key === '') {
    return { kind: 'known', status: CanonicalStatus.UNKNOWN };
  }

  const known = STATUS_ALIASES.get(key);
  if (known) {
    return { kind: 'known', status: known };
  }

  return { kind: 'other', status: text.toUpperCase() };
}
