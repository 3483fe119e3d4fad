import { Router, Request, Response } from 'express';
import { StatsSynthesizer } from '@/services/StatsSynthesizer';
import { asyncHandler } from '@/middleware/errorHandler';
import { StatsPayload, StatsReport } from '@/types';

export function toStatsPayload(report: StatsReport): StatsPayload {
  const payload: StatsPayload = {
    wait: report.waitMinutes,
    beds: report.bedOccupancyPercent,
    doctors: report.doctorsOnDuty,
    activity: report.activityScore
  };
  if (report.note !== undefined) {
    payload.note = report.note;
  }
  return payload;
}

// Always 200: store failures degrade to the fallback snapshot.
export function createStatsRouter(synthesizer: StatsSynthesizer): Router {
  const router = Router();

  router.get('/', asyncHandler(async (_req: Request, res: Response) => {
    const report = await synthesizer.snapshot();
    res.json(toStatsPayload(report));
  }));

  return router;
}
