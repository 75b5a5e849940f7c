// src/api_v1.ts
import express from 'express';
import { z } from 'zod';
import { NotFoundError, StoreReadError, errorMessage } from './errors.js';
import {
  KPI_NAMES,
  dailyTrend,
  findMeasurement,
  findZone,
  listMeasurements,
  listZones,
  outdoorAggregates,
  outdoorHourlySeries,
  zoneAggregates,
  zoneHourlySeries,
  zoneKpis,
  type MeasurementRow,
  type ZoneRow,
} from './queries.js';
import type { Store } from './store.js';

export interface ApiV1Options {
  getStore: () => Store;
  apiKeys: string[];   // empty = no auth
}

/** --- validators --- */
const ZoneParamsSchema = z.object({ zone: z.string().min(1) });
const MeasurementQuerySchema = z.object({ measurement: z.string().min(1).max(128) });
const VariableQuerySchema = z.object({ variable: z.string().min(1).max(128) });
const DailyQuerySchema = z.object({
  measurement: z.string().min(1).max(128).optional().default(KPI_NAMES.temperature),
  variable: z.string().min(1).max(128).optional().default(KPI_NAMES.outdoorTemperature),
});

function sendError(res: express.Response, e: unknown) {
  if (e instanceof z.ZodError) {
    return res.status(422).json({ error: { code: 'VALIDATION_ERROR', message: 'Invalid request', details: e.issues } });
  }
  if (e instanceof NotFoundError) {
    return res.status(404).json({ error: { code: e.code, message: e.message } });
  }
  if (e instanceof StoreReadError) {
    console.error(e);
    return res.status(500).json({ error: { code: e.code, message: e.message } });
  }
  console.error(e);
  return res.status(500).json({ error: { code: 'INTERNAL', message: errorMessage(e) || 'internal error' } });
}

function resolveZone(db: Store, name: string): ZoneRow {
  const zone = findZone(db, name);
  if (!zone) throw new NotFoundError(`zone not found: ${name}`);
  return zone;
}

function resolveMeasurement(db: Store, name: string): MeasurementRow {
  const m = findMeasurement(db, name);
  if (!m) throw new NotFoundError(`measurement not found: ${name}`);
  return m;
}

export function createApiV1({ getStore, apiKeys }: ApiV1Options): express.Router {
  const router = express.Router();

  /** --- simple auth (Bearer), only when keys are configured --- */
  function requireAuth(req: express.Request, res: express.Response, next: express.NextFunction) {
    if (!apiKeys.length) return next();
    const hdr = req.header('authorization') || '';
    const token = hdr.startsWith('Bearer ') ? hdr.slice(7) : '';
    if (!token || !apiKeys.includes(token)) {
      return res.status(401).json({ error: { code: 'UNAUTHORIZED', message: 'Invalid API key' } });
    }
    next();
  }

  /** health */
  router.get('/healthz', (_req, res) => {
    res.json({ ok: true, ts: new Date().toISOString() });
  });

  router.get('/zones', requireAuth, (_req, res) => {
    try {
      res.json({ items: listZones(getStore()) });
    } catch (e: unknown) {
      sendError(res, e);
    }
  });

  router.get('/measurements', requireAuth, (_req, res) => {
    try {
      res.json({ items: listMeasurements(getStore()) });
    } catch (e: unknown) {
      sendError(res, e);
    }
  });

  router.get('/outdoor/series', requireAuth, (req, res) => {
    try {
      const { variable } = VariableQuerySchema.parse(req.query);
      res.json({ variable, items: outdoorHourlySeries(getStore(), variable) });
    } catch (e: unknown) {
      sendError(res, e);
    }
  });

  router.get('/outdoor/aggregates', requireAuth, (req, res) => {
    try {
      const { variable } = VariableQuerySchema.parse(req.query);
      res.json({ variable, ...outdoorAggregates(getStore(), variable) });
    } catch (e: unknown) {
      sendError(res, e);
    }
  });

  router.get('/zones/:zone/series', requireAuth, (req, res) => {
    try {
      const { zone: zoneName } = ZoneParamsSchema.parse(req.params);
      const { measurement } = MeasurementQuerySchema.parse(req.query);
      const db = getStore();
      const zone = resolveZone(db, zoneName);
      const m = resolveMeasurement(db, measurement);
      res.json({
        zone: zone.ZoneName,
        measurement: m.MeasurementName,
        unit: m.Unit ?? '',
        items: zoneHourlySeries(db, zone.ZoneID, m.MeasurementID),
      });
    } catch (e: unknown) {
      sendError(res, e);
    }
  });

  router.get('/zones/:zone/aggregates', requireAuth, (req, res) => {
    try {
      const { zone: zoneName } = ZoneParamsSchema.parse(req.params);
      const { measurement } = MeasurementQuerySchema.parse(req.query);
      const db = getStore();
      const zone = resolveZone(db, zoneName);
      const m = resolveMeasurement(db, measurement);
      res.json({
        zone: zone.ZoneName,
        measurement: m.MeasurementName,
        unit: m.Unit ?? '',
        ...zoneAggregates(db, zone.ZoneID, m.MeasurementID),
      });
    } catch (e: unknown) {
      sendError(res, e);
    }
  });

  router.get('/zones/:zone/kpis', requireAuth, (req, res) => {
    try {
      const { zone: zoneName } = ZoneParamsSchema.parse(req.params);
      const db = getStore();
      const zone = resolveZone(db, zoneName);
      res.json({ zone: zone.ZoneName, ...zoneKpis(db, zone.ZoneID) });
    } catch (e: unknown) {
      sendError(res, e);
    }
  });

  router.get('/zones/:zone/daily', requireAuth, (req, res) => {
    try {
      const { zone: zoneName } = ZoneParamsSchema.parse(req.params);
      const { measurement, variable } = DailyQuerySchema.parse(req.query);
      const db = getStore();
      const zone = resolveZone(db, zoneName);
      const m = resolveMeasurement(db, measurement);
      res.json({
        zone: zone.ZoneName,
        measurement: m.MeasurementName,
        variable,
        items: dailyTrend(db, zone.ZoneID, m.MeasurementID, variable),
      });
    } catch (e: unknown) {
      sendError(res, e);
    }
  });

  return router;
}
