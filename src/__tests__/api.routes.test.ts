import request from 'supertest';
import { describe, it, expect, beforeEach } from 'vitest';

import type { Express } from 'express';

import { createApp } from '../server.js';

import { ALICE, BRUNO, buildHarness, type Harness } from '@test/utils/harness.js';

const body = {
  spaceId: 'lab-101',
  startAt: '2030-03-06T10:00:00+01:00',
  endAt: '2030-03-06T12:00:00+01:00',
  purpose: 'Reading group',
};

describe('HTTP API', () => {
  let h: Harness;
  let app: Express;

  beforeEach(() => {
    h = buildHarness();
    app = createApp({
      bookings: h.service,
      availability: h.availability,
      spaces: h.spaces,
      timezone: 'Europe/Rome',
      clock: h.clock,
      healthChecks: {},
    });
  });

  async function createAsAlice() {
    const res = await request(app).post('/v1/bookings').set('x-user-id', ALICE.id).send(body);
    expect(res.status).toBe(201);
    const id: string = res.body.booking.id;
    return id;
  }

  it('requires a user id', async () => {
    const res = await request(app).post('/v1/bookings').send(body);
    expect(res.status).toBe(401);
    expect(res.body.code).toBe('UNAUTHORIZED');
    expect(res.body.message).toBe('Missing x-user-id header');
  });

  it('creates a booking owned by the caller', async () => {
    const res = await request(app)
      .post('/v1/bookings')
      .set('x-user-id', ALICE.id)
      .send({ ...body, ownerId: BRUNO.id });

    expect(res.status).toBe(201);
    expect(res.body.booking.ownerId).toBe('u-alice');
    expect(res.body.booking.startAt).toBe('2030-03-06T09:00:00.000Z');
    expect(res.body.warnings).toEqual([]);
    expect(res.body.sideEffects).toHaveLength(4);
  });

  it('answers 409 with alternatives on a conflict', async () => {
    await createAsAlice();
    const res = await request(app).post('/v1/bookings').set('x-user-id', BRUNO.id).send(body);

    expect(res.status).toBe(409);
    expect(res.body.code).toBe('CONFLICT');
    expect(res.body.data.kind).toBe('SpaceUnavailable');
    expect(res.body.data.alternatives[0]).toEqual({
      start: '2030-03-06T07:00:00.000Z',
      end: '2030-03-06T09:00:00.000Z',
      reason: 'closest',
    });
  });

  it('answers 422 for rule violations', async () => {
    const res = await request(app)
      .post('/v1/bookings')
      .set('x-user-id', ALICE.id)
      .send({ ...body, startAt: '2030-03-06T07:00:00+01:00', endAt: '2030-03-06T09:00:00+01:00' });

    expect(res.status).toBe(422);
    expect(res.body.data).toEqual({ kind: 'OutsideOperatingHours' });
  });

  it('answers 400 for malformed JSON', async () => {
    const res = await request(app)
      .post('/v1/bookings')
      .set('x-user-id', ALICE.id)
      .set('content-type', 'application/json')
      .send('{"spaceId":');
    expect(res.status).toBe(400);
    expect(res.body.data).toEqual({ kind: 'InvalidRequest' });
  });

  it("hides other users' bookings from update and cancel", async () => {
    const id = await createAsAlice();
    const put = await request(app).put(`/v1/bookings/${id}`).set('x-user-id', BRUNO.id).send({ notes: 'x' });
    expect(put.status).toBe(404);
    const del = await request(app).delete(`/v1/bookings/${id}`).set('x-user-id', BRUNO.id);
    expect(del.status).toBe(404);
  });

  it('updates and cancels own bookings', async () => {
    const id = await createAsAlice();

    const put = await request(app)
      .put(`/v1/bookings/${id}`)
      .set('x-user-id', ALICE.id)
      .send({ startAt: '2030-03-06T14:00:00+01:00', endAt: '2030-03-06T15:00:00+01:00' });
    expect(put.status).toBe(200);
    expect(put.body.booking.startAt).toBe('2030-03-06T13:00:00.000Z');

    const del = await request(app).delete(`/v1/bookings/${id}`).set('x-user-id', ALICE.id).send({ reason: 'Ill' });
    expect(del.status).toBe(200);
    expect(del.body.booking.status).toBe('cancelled');
    expect(del.body.booking.cancellationReason).toBe('Ill');

    const again = await request(app).delete(`/v1/bookings/${id}`).set('x-user-id', ALICE.id);
    expect(again.status).toBe(404);
  });

  it('lists history and statistics', async () => {
    await createAsAlice();

    const history = await request(app).get('/v1/bookings/history').set('x-user-id', ALICE.id);
    expect(history.status).toBe(200);
    expect(history.body.bookings).toHaveLength(1);
    expect(history.body.bookings[0].spaceName).toBe('Computer Lab 101');

    const stats = await request(app).get('/v1/bookings/stats').set('x-user-id', ALICE.id);
    expect(stats.body).toEqual({ totalBookings: 1, confirmedBookings: 1, cancelledBookings: 0, totalHours: 2 });
  });

  it('serves the daily grid of a space', async () => {
    const id = await createAsAlice();
    const res = await request(app).get('/v1/spaces/lab-101/availability?date=2030-03-06').set('x-user-id', BRUNO.id);
    expect(res.status).toBe(200);
    expect(res.body.slots).toHaveLength(12);
    expect(res.body.slots[2]).toEqual({
      start: '2030-03-06T09:00:00.000Z',
      end: '2030-03-06T10:00:00.000Z',
      available: false,
    });
    expect(res.body.bookings).toEqual([
      {
        id,
        startAt: '2030-03-06T09:00:00.000Z',
        endAt: '2030-03-06T11:00:00.000Z',
        purpose: 'Reading group',
        status: 'confirmed',
        isOwnBooking: false,
      },
    ]);

    const unknown = await request(app).get('/v1/spaces/nowhere/availability?date=2030-03-06').set('x-user-id', BRUNO.id);
    expect(unknown.status).toBe(404);
    const badDate = await request(app).get('/v1/spaces/lab-101/availability?date=06-03-2030').set('x-user-id', BRUNO.id);
    expect(badDate.status).toBe(422);
  });

  it('checks a single window', async () => {
    await createAsAlice();
    const res = await request(app)
      .get('/v1/availability/check')
      .query({ spaceId: 'lab-101', startAt: '2030-03-06T12:00:00+01:00', endAt: '2030-03-06T13:00:00+01:00' })
      .set('x-user-id', BRUNO.id);
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      spaceId: 'lab-101',
      startAt: '2030-03-06T11:00:00.000Z',
      endAt: '2030-03-06T12:00:00.000Z',
      available: true,
      alternatives: [],
    });
  });

  it('checks several spaces and dates at once', async () => {
    await createAsAlice();
    const res = await request(app)
      .post('/v1/availability/bulk')
      .set('x-user-id', BRUNO.id)
      .send({ spaceIds: ['lab-101'], dates: ['2030-03-06'], startTime: '11:00', endTime: '12:00' });
    expect(res.status).toBe(200);
    expect(res.body.results[0].availability).toEqual([
      { date: '2030-03-06', available: false, conflictReason: 'occupied' },
    ]);

    const invalid = await request(app).post('/v1/availability/bulk').set('x-user-id', BRUNO.id).send({ spaceIds: [] });
    expect(invalid.status).toBe(422);
    expect(invalid.body.data.kind).toBe('InvalidRequest');
  });

  it('serves the shared calendar', async () => {
    await createAsAlice();
    const res = await request(app)
      .get('/v1/calendar/bookings?from=2030-03-06&to=2030-03-06')
      .set('x-user-id', BRUNO.id);
    expect(res.status).toBe(200);
    expect(res.body.bookings).toHaveLength(1);
    expect(res.body.bookings[0].isOwnBooking).toBe(false);
    expect(res.body.bookings[0].ownerId).toBeUndefined();

    const missing = await request(app).get('/v1/calendar/bookings').set('x-user-id', BRUNO.id);
    expect(missing.status).toBe(422);
  });

  it('serves the dashboard statistics', async () => {
    const id = await createAsAlice();
    const res = await request(app).get('/v1/calendar/stats').set('x-user-id', ALICE.id);
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      todayBookings: 0,
      weekBookings: 1,
      monthBookings: 1,
      popularSpaces: [{ spaceId: 'lab-101', spaceName: 'Computer Lab 101', bookingCount: 1 }],
      nextBookings: [
        {
          id,
          spaceId: 'lab-101',
          spaceName: 'Computer Lab 101',
          startAt: '2030-03-06T09:00:00.000Z',
          endAt: '2030-03-06T11:00:00.000Z',
          purpose: 'Reading group',
        },
      ],
      generatedAt: '2030-03-04T08:00:00.000Z',
    });

    const anonymous = await request(app).get('/v1/calendar/stats');
    expect(anonymous.status).toBe(401);
  });

  it('reports health without authentication', async () => {
    const res = await request(app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
    expect(res.body.checks).toEqual({});
  });

  it('reports degraded health when a dependency is down', async () => {
    const degraded = createApp({
      bookings: h.service,
      availability: h.availability,
      spaces: h.spaces,
      timezone: 'Europe/Rome',
      healthChecks: {
        database: async () => true,
        redis: async () => {
          throw new Error('connection refused');
        },
      },
    });
    const res = await request(degraded).get('/health');
    expect(res.status).toBe(503);
    expect(res.body.checks).toEqual({ database: 'up', redis: 'down' });
  });
});
