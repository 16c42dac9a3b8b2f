/**
 * Tests for the Crisis Escalation State Machine transition table
 */

import {
  canTransition,
  evaluateTransition,
  isOpen,
  isTerminal
} from '../src/services/crisis-state-machine';
import type { CrisisEvent, CrisisState } from '../src/types/crisis';

const NOTIFY: CrisisEvent = { type: 'NOTIFY' };
const ACKNOWLEDGE: CrisisEvent = { type: 'ACKNOWLEDGE', actor: 'counselor-1' };
const BEGIN_PROGRESS: CrisisEvent = { type: 'BEGIN_PROGRESS', actor: 'counselor-1' };
const RESOLVE: CrisisEvent = { type: 'RESOLVE', actor: 'counselor-1', notes: 'Student safe with family' };
const ACK_TIMEOUT: CrisisEvent = { type: 'ACK_TIMEOUT' };

describe('Crisis Escalation State Machine', () => {
  describe('allowed transitions', () => {
    const allowed: Array<[CrisisState, CrisisEvent, CrisisState]> = [
      ['DETECTED', NOTIFY, 'NOTIFYING'],
      ['NOTIFYING', ACKNOWLEDGE, 'ACKNOWLEDGED'],
      ['NOTIFYING', ACK_TIMEOUT, 'ESCALATED'],
      ['ESCALATED', ACKNOWLEDGE, 'ACKNOWLEDGED'],
      ['ACKNOWLEDGED', BEGIN_PROGRESS, 'IN_PROGRESS'],
      ['ACKNOWLEDGED', RESOLVE, 'RESOLVED'],
      ['IN_PROGRESS', RESOLVE, 'RESOLVED']
    ];

    it.each(allowed)('should move %s on %o to %s', (from, event, to) => {
      expect(evaluateTransition(from, event, 'crisis-1')).toBe(to);
    });
  });

  describe('rejected transitions', () => {
    const rejected: Array<[CrisisState, CrisisEvent]> = [
      ['DETECTED', ACKNOWLEDGE],
      ['DETECTED', RESOLVE],
      ['DETECTED', ACK_TIMEOUT],
      ['NOTIFYING', NOTIFY],
      ['NOTIFYING', RESOLVE],
      ['ACKNOWLEDGED', ACKNOWLEDGE],
      ['ACKNOWLEDGED', ACK_TIMEOUT],
      ['IN_PROGRESS', BEGIN_PROGRESS],
      ['ESCALATED', RESOLVE],
      ['ESCALATED', ACK_TIMEOUT]
    ];

    it.each(rejected)('should reject %s on %o', (from, event) => {
      expect(evaluateTransition(from, event)).toBeNull();
      expect(canTransition(from, event)).toBe(false);
    });

    it('should reject every event once resolved', () => {
      for (const event of [NOTIFY, ACKNOWLEDGE, BEGIN_PROGRESS, RESOLVE, ACK_TIMEOUT]) {
        expect(evaluateTransition('RESOLVED', event)).toBeNull();
      }
    });
  });

  it('should treat only RESOLVED as terminal', () => {
    expect(isTerminal('RESOLVED')).toBe(true);
    expect(isOpen('RESOLVED')).toBe(false);
    expect(isOpen('ESCALATED')).toBe(true);
    expect(isTerminal('IN_PROGRESS')).toBe(false);
  });
});
