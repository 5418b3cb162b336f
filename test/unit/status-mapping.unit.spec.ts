/**
 * Unit tests for status enumerations
 */

import {
  HEALTH_STATUS_LABELS,
  mapHealthStatus,
  mapSyncStatus,
  SYNC_STATUS_LABELS,
} from '../../src/tasks/iocmng/status-mapping';

describe('status mapping', () => {
  it.each([
    ['Synced', 0],
    ['OutOfSync', 1],
    ['Unknown', 2],
    ['Error', 3],
    ['SomethingNew', 3],
    ['', 3],
  ])('maps sync status %p to %p', (status, code) => {
    expect(mapSyncStatus(status)).toBe(code);
  });

  it.each([
    ['Healthy', 0],
    ['Progressing', 1],
    ['Degraded', 2],
    ['Missing', 3],
    ['Unknown', 4],
    ['Suspended', 5],
    ['constructor', 5],
  ])('maps health status %p to %p', (status, code) => {
    expect(mapHealthStatus(status)).toBe(code);
  });

  it('has a label for every code', () => {
    expect(SYNC_STATUS_LABELS).toHaveLength(4);
    expect(HEALTH_STATUS_LABELS).toHaveLength(6);
    expect(HEALTH_STATUS_LABELS[mapHealthStatus('Missing')]).toBe('Missing');
  });
});
