/**
 * Bench API Routes
 *
 * REST endpoints for direct instrument access, sweeps and curve analysis.
 * Request bodies are validated with zod; hardware work goes through the
 * bench session so that only one operation drives the instruments at a time.
 */

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';

import { ValidationError, PortUnavailableError } from '../utils/errors.js';
import { log } from '../utils/logger.js';
import { config } from '../config.js';
import { getBenchSession } from '../state.js';
import { analyzeCurve, toColumns } from '../services/analysis/curve-analysis.js';
import type { BenchSession } from '../services/bench/bench-session.js';
import type { ApiResponse } from '../types/index.js';
import { ADC_CHANNEL_COUNT, DAC_CHANNEL_COUNT, DAC_MAX_CODE } from '../types/bench-types.js';

export type SessionProvider = () => BenchSession | null;

// ============================================================================
// Validation Middleware
// ============================================================================

function validate<T>(schema: z.ZodSchema<T>) {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      req.body = schema.parse(req.body);
      next();
    } catch (error) {
      if (error instanceof z.ZodError) {
        next(new ValidationError('Invalid request body', {
          operation: 'validation',
          errors: error.errors,
        }));
      } else {
        next(error);
      }
    }
  };
}

function parseParam<T>(schema: z.ZodSchema<T>, value: unknown, name: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid ${name}`, {
      operation: 'validation',
      input: value,
      errors: result.error.errors,
    });
  }
  return result.data;
}

// ============================================================================
// Validation Schemas
// ============================================================================

const ChannelParamSchema = z.coerce.number().int().nonnegative();

const DacCodeSchema = z.number().int().min(0).max(DAC_MAX_CODE);
const DacChannelSchema = z.number().int().min(0).max(DAC_CHANNEL_COUNT - 1);
const AdcChannelSchema = z.number().int().min(0).max(ADC_CHANNEL_COUNT - 1);
const OpmChannelSchema = z.number().int().nonnegative();

const SetpointSchema = z.union([
  z.object({
    code: DacCodeSchema,
    waitAck: z.boolean().optional(),
  }),
  z.object({
    voltage: z.number(),
    vref: z.number().optional(),
    waitAck: z.boolean().optional(),
  }),
]);

const SetAllSchema = z.object({
  code: DacCodeSchema,
  waitAck: z.boolean().optional(),
});

const ShuntTableSchema = z.object({
  ohms: z.array(z.number().positive()).length(ADC_CHANNEL_COUNT),
});

const PowerQuerySchema = z.object({
  unit: z.enum(['mW', 'dBm']).default('dBm'),
});

const BatchedQuerySchema = z.object({
  batched: z.enum(['true', 'false']).optional(),
});

// Schedules are checked again by the sweep engine, which reports issues
// in the sweep result instead of rejecting the request.
const ScheduleSchema = z.object({
  channel: z.number(),
  start: z.number(),
  end: z.number(),
  steps: z.number(),
});

const RunOptionsSchema = z.object({
  settleMs: z.number().int().nonnegative().optional(),
  waitAck: z.boolean().optional(),
});

const ChannelSweepSchema = ScheduleSchema.merge(RunOptionsSchema);

const AllChannelSweepSchema = z.object({
  starts: z.array(z.number()),
  ends: z.array(z.number()),
  steps: z.number(),
}).merge(RunOptionsSchema);

const IndependentSweepSchema = z.object({
  schedules: z.array(ScheduleSchema),
}).merge(RunOptionsSchema);

const IvSweepSchema = z.object({
  schedule: ScheduleSchema,
  adcChannel: AdcChannelSchema,
  opmChannel: OpmChannelSchema.optional(),
  settleMs: z.number().int().nonnegative().optional(),
});

const MeasurePointSchema = z.object({
  dacChannel: DacChannelSchema,
  code: DacCodeSchema,
  adcChannel: AdcChannelSchema,
  opmChannel: OpmChannelSchema.optional(),
  settleMs: z.number().int().nonnegative().optional(),
});

const CurveSchema = z.object({
  points: z.array(z.object({
    voltage: z.number(),
    current: z.number(),
  })),
});

// ============================================================================
// Helpers
// ============================================================================

function ok<T>(res: Response, data: T, status = 200): void {
  const body: ApiResponse<T> = {
    success: status < 400,
    data,
    metadata: { timestamp: new Date().toISOString() },
  };
  res.status(status).json(body);
}

// ============================================================================
// Route Factory
// ============================================================================

export function createApiRoutes(getSession: SessionProvider = getBenchSession): Router {
  const router = Router();

  function requireSession(operation: string): BenchSession {
    const session = getSession();
    if (!session) {
      throw new PortUnavailableError(config.serial.path, 'bench session is not open', { operation });
    }
    return session;
  }

  // ============================================================================
  // Bench
  // ============================================================================

  /**
   * Instrument connection state and current activity
   * GET /bench/status
   */
  router.get('/bench/status', (_req: Request, res: Response, next: NextFunction) => {
    try {
      ok(res, requireSession('status').status());
    } catch (error) {
      next(error);
    }
  });

  /**
   * MCU liveness check
   * POST /bench/ping
   */
  router.post('/bench/ping', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const session = requireSession('ping');
      const alive = await session.exclusive('point', () => session.link.checkCommunication());
      ok(res, { alive });
    } catch (error) {
      next(error);
    }
  });

  // ============================================================================
  // DAC
  // ============================================================================

  /**
   * Set every DAC channel to one code
   * POST /dac/all
   */
  router.post('/dac/all',
    validate(SetAllSchema),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const session = requireSession('setAll');
        const { code, waitAck }: z.infer<typeof SetAllSchema> = req.body;
        const result = await session.exclusive('point', () => session.dac.setAll(code, { waitAck }));
        ok(res, result, result.accepted ? 200 : 400);
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * Set one DAC channel by code or by voltage
   * POST /dac/:channel
   */
  router.post('/dac/:channel',
    validate(SetpointSchema),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const session = requireSession('setDac');
        const channel = parseParam(ChannelParamSchema, req.params.channel, 'channel');
        const body: z.infer<typeof SetpointSchema> = req.body;

        const result = await session.exclusive('point', () =>
          'code' in body
            ? session.dac.setCode(channel, body.code, { waitAck: body.waitAck })
            : session.dac.setVoltage(channel, body.voltage, body.vref ?? session.dac.vref, { waitAck: body.waitAck })
        );

        ok(res, result, result.accepted ? 200 : 400);
      } catch (error) {
        next(error);
      }
    }
  );

  // ============================================================================
  // ADC
  // ============================================================================

  /**
   * Voltages and currents on every ADC channel
   * GET /adc
   */
  router.get('/adc', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const session = requireSession('readAdc');
      const data = await session.exclusive('point', async () => {
        const voltages = await session.adc.readAllVoltages();
        const shunts = session.adc.getShuntResistances();
        const currents = voltages.map((v, channel) => (v === null ? null : v / shunts[channel]));
        return { voltages, currents, shuntResistances: shunts };
      });
      ok(res, data);
    } catch (error) {
      next(error);
    }
  });

  /**
   * Replace the shunt resistance table
   * PUT /adc/shunts
   */
  router.put('/adc/shunts',
    validate(ShuntTableSchema),
    (req: Request, res: Response, next: NextFunction) => {
      try {
        const session = requireSession('setShunts');
        const { ohms }: z.infer<typeof ShuntTableSchema> = req.body;
        if (!session.adc.setShuntResistances(ohms)) {
          throw new ValidationError('Shunt resistance table rejected', { operation: 'setShunts', input: ohms });
        }
        log.info('Shunt resistances updated', { ohms });
        ok(res, { shuntResistances: session.adc.getShuntResistances() });
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * Firmware ADC bus self-test
   * POST /adc/test
   */
  router.post('/adc/test', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const session = requireSession('testAdc');
      const result = await session.exclusive('point', () => session.adc.testBus());
      ok(res, result);
    } catch (error) {
      next(error);
    }
  });

  /**
   * Voltage, raw code and current on one channel
   * GET /adc/:channel
   */
  router.get('/adc/:channel', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = requireSession('readAdcChannel');
      const channel = parseParam(ChannelParamSchema, req.params.channel, 'channel');
      if (channel >= ADC_CHANNEL_COUNT) {
        throw new ValidationError(`Channel must be 0-${ADC_CHANNEL_COUNT - 1}`, {
          operation: 'readAdcChannel',
          input: channel,
        });
      }

      const reading = await session.exclusive('point', () => session.adc.readVoltageDetailed(channel));
      const shunt = session.adc.getShuntResistances()[channel];
      ok(res, {
        channel,
        voltage: reading?.voltage ?? null,
        raw: reading?.raw ?? null,
        current: reading ? reading.voltage / shunt : null,
      });
    } catch (error) {
      next(error);
    }
  });

  // ============================================================================
  // Optical Power Meter
  // ============================================================================

  function requireMeter(session: BenchSession, operation: string) {
    if (!session.opm || !session.opm.isConnected()) {
      throw new PortUnavailableError(config.opm.resource ?? 'opm', 'no power meter connected', { operation });
    }
    return session.opm;
  }

  /**
   * Power on every meter channel (null where a read failed)
   * GET /opm/powers?batched=true
   */
  router.get('/opm/powers', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = requireSession('getAllPowers');
      const opm = requireMeter(session, 'getAllPowers');
      const { batched } = parseParam(BatchedQuerySchema, req.query, 'query');
      const powers = await session.exclusive('point', () => opm.getAllPowers({ batched: batched === 'true' }));
      ok(res, { powers: powers.map((p) => (Number.isNaN(p) ? null : p)) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Power on one meter channel
   * GET /opm/:channel/power?unit=mW|dBm
   */
  router.get('/opm/:channel/power', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = requireSession('getPower');
      const opm = requireMeter(session, 'getPower');
      const channel = parseParam(ChannelParamSchema, req.params.channel, 'channel');
      const { unit } = parseParam(PowerQuerySchema, req.query, 'query');
      if (!opm.isValidChannel(channel)) {
        throw new ValidationError(`Channel must be 0-${opm.channelCount - 1}`, {
          operation: 'getPower',
          input: channel,
        });
      }

      const power = await session.exclusive('point', () =>
        unit === 'mW' ? opm.getPowerMilliwatt(channel) : opm.getPower(channel)
      );
      ok(res, { channel, unit, power });
    } catch (error) {
      next(error);
    }
  });

  // ============================================================================
  // Sweeps
  // ============================================================================

  /**
   * Single composite sample
   * POST /measure
   */
  router.post('/measure',
    validate(MeasurePointSchema),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const session = requireSession('measurePoint');
        const request: z.infer<typeof MeasurePointSchema> = req.body;
        const sample = await session.exclusive('point', () => session.engine.measurePoint(request));
        ok(res, sample);
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * Single-channel sweep
   * POST /sweeps/channel
   */
  router.post('/sweeps/channel',
    validate(ChannelSweepSchema),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const session = requireSession('sweepChannel');
        const { settleMs, waitAck, ...schedule }: z.infer<typeof ChannelSweepSchema> = req.body;
        const result = await session.exclusive('channel', (signal) =>
          session.engine.sweepChannel(schedule, { signal, settleMs, waitAck })
        );
        ok(res, result, result.status === 'rejected' ? 400 : 200);
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * Synchronized sweep of all DAC channels
   * POST /sweeps/all
   */
  router.post('/sweeps/all',
    validate(AllChannelSweepSchema),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const session = requireSession('sweepAllChannels');
        const { starts, ends, steps, settleMs, waitAck }: z.infer<typeof AllChannelSweepSchema> = req.body;
        const result = await session.exclusive('all', (signal) =>
          session.engine.sweepAllChannels(starts, ends, steps, { signal, settleMs, waitAck })
        );
        ok(res, result, result.status === 'rejected' ? 400 : 200);
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * Independent per-channel schedules
   * POST /sweeps/independent
   */
  router.post('/sweeps/independent',
    validate(IndependentSweepSchema),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const session = requireSession('sweepIndependent');
        const { schedules, settleMs, waitAck }: z.infer<typeof IndependentSweepSchema> = req.body;
        const result = await session.exclusive('independent', (signal) =>
          session.engine.sweepIndependent(schedules, { signal, settleMs, waitAck })
        );
        ok(res, result, result.status === 'rejected' ? 400 : 200);
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * IV sweep with composite samples, columns and curve analysis
   * POST /sweeps/iv
   */
  router.post('/sweeps/iv',
    validate(IvSweepSchema),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const session = requireSession('sweepIvCurve');
        const { settleMs, ...request }: z.infer<typeof IvSweepSchema> = req.body;
        const result = await session.exclusive('iv', (signal) =>
          session.engine.sweepIvCurve(request, { signal, settleMs })
        );

        ok(res, {
          ...result,
          columns: toColumns(result.records),
          analysis: analyzeCurve(result.records),
        }, result.status === 'rejected' ? 400 : 200);
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * Stop the running sweep after its current step
   * POST /sweeps/cancel
   */
  router.post('/sweeps/cancel', (_req: Request, res: Response, next: NextFunction) => {
    try {
      const session = requireSession('cancelSweep');
      ok(res, { cancelled: session.cancelSweep() });
    } catch (error) {
      next(error);
    }
  });

  // ============================================================================
  // Analysis
  // ============================================================================

  /**
   * Figures of merit for a caller-supplied curve
   * POST /analysis/curve
   */
  router.post('/analysis/curve',
    validate(CurveSchema),
    (req: Request, res: Response, next: NextFunction) => {
      try {
        const { points }: z.infer<typeof CurveSchema> = req.body;
        ok(res, analyzeCurve(points));
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
