import { describe, it, expect } from 'vitest';
import { EVENT_NAME_MAX_LENGTH, validateEvent } from '../../../src/modules/events/event.model';
import { catchAppErrorSync } from '../../helpers/catch-app-error';

const START = new Date('2026-06-01T10:00:00.000Z');

describe('validateEvent', () => {
  it('accepts a complete candidate and trims the name', () => {
    expect(
      validateEvent({ ownerId: 'usr_1', name: '  Picnic  ', startAt: START, endAt: null }),
    ).toEqual({ ownerId: 'usr_1', name: 'Picnic', startAt: START, endAt: null });
  });

  it('rejects a missing name and a missing start time, listing both', () => {
    const err = catchAppErrorSync(() =>
      validateEvent({ ownerId: 'usr_1', name: undefined, startAt: undefined, endAt: null }),
    );

    expect(err.code).toBe('VALIDATION_ERROR');
    expect(err.message).toBe('Event is invalid');
    expect(err.meta).toEqual({
      issues: [
        { path: 'name', message: 'Name is required' },
        { path: 'startAt', message: 'Start time is required' },
      ],
    });
  });

  it('rejects a blank name', () => {
    const err = catchAppErrorSync(() =>
      validateEvent({ ownerId: 'usr_1', name: '   ', startAt: START, endAt: null }),
    );

    expect(err.meta).toEqual({ issues: [{ path: 'name', message: 'Name is required' }] });
  });

  it('enforces the name length limit', () => {
    const longest = 'x'.repeat(EVENT_NAME_MAX_LENGTH);
    expect(validateEvent({ ownerId: 'usr_1', name: longest, startAt: START, endAt: null }).name).toBe(
      longest,
    );

    const err = catchAppErrorSync(() =>
      validateEvent({ ownerId: 'usr_1', name: `${longest}x`, startAt: START, endAt: null }),
    );
    expect(err.meta).toEqual({
      issues: [{ path: 'name', message: 'Name must be at most 200 characters' }],
    });
  });

  it('rejects an end before the start, accepts an end equal to the start', () => {
    const before = new Date(START.getTime() - 1);

    const err = catchAppErrorSync(() =>
      validateEvent({ ownerId: 'usr_1', name: 'Picnic', startAt: START, endAt: before }),
    );
    expect(err.meta).toEqual({
      issues: [{ path: 'endAt', message: 'End time must not be before start time' }],
    });

    expect(
      validateEvent({ ownerId: 'usr_1', name: 'Picnic', startAt: START, endAt: START }).endAt,
    ).toEqual(START);
  });
});
