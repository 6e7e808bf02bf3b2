import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { buildTestApp } from '../helpers/build-test-app';
import { TEST_PASSWORD, seedMember } from '../helpers/fixtures';
import { loginAs } from '../helpers/session-cookie';

const EventSchema = z.object({
  id: z.string().uuid(),
  ownerId: z.string(),
  name: z.string(),
  startAt: z.string(),
  endAt: z.string().nullable(),
  createdAt: z.string(),
});

const CreatedSchema = z.object({ event: EventSchema });

async function setup() {
  const built = await buildTestApp();
  const { app, deps } = built;

  const parent = await seedMember({ ...deps, role: 'PARENT', email: 'mom@example.com' });
  const child = await seedMember({ ...deps, role: 'CHILD', email: 'kid@example.com' });

  const parentCookie = await loginAs(app, { email: parent.email, password: TEST_PASSWORD });
  const childCookie = await loginAs(app, { email: child.email, password: TEST_PASSWORD });

  return { ...built, parent, child, parentCookie, childCookie };
}

describe('POST /events', () => {
  it('parent creates an event -> 201 with the serialized event; notification dispatched', async () => {
    const { app, deps, parent, parentCookie, close } = await setup();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/events',
        headers: { cookie: parentCookie },
        payload: {
          name: 'Beach day',
          startAt: '2026-06-01T10:00:00Z',
          endAt: '2026-06-01T16:00:00+00:00',
        },
      });

      expect(res.statusCode).toBe(201);

      const { event } = CreatedSchema.parse(res.json());
      expect(event).toMatchObject({
        ownerId: parent.id,
        name: 'Beach day',
        startAt: '2026-06-01T10:00:00.000Z',
        endAt: '2026-06-01T16:00:00.000Z',
      });

      expect(deps.queue.drain()).toEqual([
        {
          type: 'events.event-created',
          eventId: event.id,
          ownerId: parent.id,
          name: 'Beach day',
          startAt: '2026-06-01T10:00:00.000Z',
        },
      ]);
    } finally {
      await close();
    }
  });

  it('drops unpermitted keys: the owner always comes from the session', async () => {
    const { app, parent, child, parentCookie, close } = await setup();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/events',
        headers: { cookie: parentCookie },
        payload: {
          name: 'Movie night',
          startAt: '2026-06-02T19:00:00Z',
          ownerId: child.id,
          id: '00000000-0000-4000-8000-000000000000',
        },
      });

      expect(res.statusCode).toBe(201);

      const { event } = CreatedSchema.parse(res.json());
      expect(event.ownerId).toBe(parent.id);
      expect(event.id).not.toBe('00000000-0000-4000-8000-000000000000');
      expect(event.endAt).toBeNull();
    } finally {
      await close();
    }
  });

  it('child -> 403 with only code + message; nothing created or dispatched', async () => {
    const { app, deps, child, childCookie, close } = await setup();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/events',
        headers: { cookie: childCookie },
        payload: { name: 'Sleepover', startAt: '2026-06-03T20:00:00Z' },
      });

      expect(res.statusCode).toBe(403);
      expect(res.json()).toEqual({
        error: { code: 'FORBIDDEN', message: 'Only parents can create events' },
      });
      expect(await deps.eventStore.listEventsByOwner(child.id)).toEqual([]);
      expect(deps.queue.drain()).toEqual([]);
    } finally {
      await close();
    }
  });

  it('missing name -> 400 from the model; nothing dispatched', async () => {
    const { app, deps, parent, parentCookie, close } = await setup();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/events',
        headers: { cookie: parentCookie },
        payload: { startAt: '2026-06-01T10:00:00Z' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: { code: 'VALIDATION_ERROR', message: 'Event is invalid' } });
      expect(await deps.eventStore.listEventsByOwner(parent.id)).toEqual([]);
      expect(deps.queue.drain()).toEqual([]);
    } finally {
      await close();
    }
  });

  it('end before start -> 400', async () => {
    const { app, parentCookie, close } = await setup();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/events',
        headers: { cookie: parentCookie },
        payload: {
          name: 'Backwards',
          startAt: '2026-06-01T10:00:00Z',
          endAt: '2026-06-01T09:00:00Z',
        },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: { code: 'VALIDATION_ERROR', message: 'Event is invalid' } });
    } finally {
      await close();
    }
  });

  it('malformed date -> 400 from the request schema', async () => {
    const { app, parentCookie, close } = await setup();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/events',
        headers: { cookie: parentCookie },
        payload: { name: 'Picnic', startAt: 'next tuesday' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: { code: 'VALIDATION_ERROR', message: 'Invalid request body' },
      });
    } finally {
      await close();
    }
  });

  it('no session -> 401', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/events',
        payload: { name: 'Picnic', startAt: '2026-06-01T10:00:00Z' },
      });

      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({
        error: { code: 'UNAUTHORIZED', message: 'Authentication required' },
      });
    } finally {
      await close();
    }
  });
});

describe('GET /events and /events/:eventId', () => {
  it('lists own events soonest first and hides other people’s events', async () => {
    const { app, parentCookie, childCookie, close } = await setup();

    try {
      for (const [name, startAt] of [
        ['July', '2026-07-01T10:00:00Z'],
        ['June', '2026-06-01T10:00:00Z'],
      ]) {
        const created = await app.inject({
          method: 'POST',
          url: '/events',
          headers: { cookie: parentCookie },
          payload: { name, startAt },
        });
        expect(created.statusCode).toBe(201);
      }

      const list = await app.inject({ method: 'GET', url: '/events', headers: { cookie: parentCookie } });
      const { events } = z.object({ events: z.array(EventSchema) }).parse(list.json());
      expect(events.map((e) => e.name)).toEqual(['June', 'July']);

      const [first] = events;
      if (!first) throw new Error('expected an event');

      const asOwner = await app.inject({
        method: 'GET',
        url: `/events/${first.id}`,
        headers: { cookie: parentCookie },
      });
      expect(asOwner.statusCode).toBe(200);
      expect(asOwner.json()).toEqual({ event: first, invitations: [] });

      const asStranger = await app.inject({
        method: 'GET',
        url: `/events/${first.id}`,
        headers: { cookie: childCookie },
      });
      expect(asStranger.statusCode).toBe(404);
      expect(asStranger.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'Event not found' } });
    } finally {
      await close();
    }
  });

  it('non-uuid event id -> 400', async () => {
    const { app, parentCookie, close } = await setup();

    try {
      const res = await app.inject({
        method: 'GET',
        url: '/events/not-a-uuid',
        headers: { cookie: parentCookie },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: { code: 'VALIDATION_ERROR', message: 'Invalid request params' },
      });
    } finally {
      await close();
    }
  });
});
