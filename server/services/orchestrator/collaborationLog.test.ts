/**
 * Unit Tests for the Collaboration Log
 *
 * Run with: npx vitest run server/services/orchestrator/collaborationLog.test.ts
 */

import { describe, it, expect } from 'vitest';
import { CollaborationLog } from './collaborationLog';

const tickingClock = () => {
  let second = 0;
  return () => new Date(Date.UTC(2025, 9, 1, 0, 0, second++));
};

describe('CollaborationLog', () => {
  it('should number commands from 1 and record completion', () => {
    const log = new CollaborationLog(tickingClock());

    const first = log.send('system', 'flight_api', 'SEARCH_FLIGHTS', { origin: 'Seoul' });
    const second = log.send('user', 'planner', 'CREATE_ITINERARY');
    log.complete(first, 'failed', 'Flight search failed: timeout');
    log.complete(second, 'completed_with_warning');
    log.finish();

    expect(log.snapshot()).toEqual({
      startedAt: '2025-10-01T00:00:00.000Z',
      endedAt: '2025-10-01T00:00:05.000Z',
      commands: [
        {
          id: 1,
          from: 'system',
          to: 'flight_api',
          command: 'SEARCH_FLIGHTS',
          params: { origin: 'Seoul' },
          status: 'failed',
          timestamp: '2025-10-01T00:00:01.000Z',
          completedAt: '2025-10-01T00:00:03.000Z',
          result: 'Flight search failed: timeout',
        },
        {
          id: 2,
          from: 'user',
          to: 'planner',
          command: 'CREATE_ITINERARY',
          params: {},
          status: 'completed_with_warning',
          timestamp: '2025-10-01T00:00:02.000Z',
          completedAt: '2025-10-01T00:00:04.000Z',
        },
      ],
    });
  });

  it('should leave unfinished commands pending and omit endedAt', () => {
    const log = new CollaborationLog(tickingClock());
    log.send('system', 'stylist', 'ANALYZE_TRAVEL_STYLE');

    const snapshot = log.snapshot();

    expect(snapshot.commands[0].status).toBe('pending');
    expect(snapshot).not.toHaveProperty('endedAt');
    expect(log.size).toBe(1);
  });

  it('should ignore an unknown command id', () => {
    const log = new CollaborationLog(tickingClock());

    log.complete(99, 'completed');

    expect(log.size).toBe(0);
  });

  it('should hand out copies', () => {
    const log = new CollaborationLog(tickingClock());
    log.send('system', 'hotel_api', 'SEARCH_HOTELS', { city: 'Tokyo' });

    const snapshot = log.snapshot();
    snapshot.commands[0].params.city = 'Osaka';

    expect(log.snapshot().commands[0].params).toEqual({ city: 'Tokyo' });
  });
});
