import logger from '@/config/logger';
import { DateUtils } from '@/middleware/dateUtils';
import { err, ok } from '@/store/result';
import {
  DocumentStore,
  LiveCounts,
  StatsReport,
  StatsSnapshot,
  StoreError,
  StoreResult
} from '@/types';

export const TOTAL_BEDS = 250;
export const NOTE_MAX_LENGTH = 80;

/** Served whenever the live counts cannot be read. */
export const FALLBACK_SNAPSHOT: Readonly<StatsSnapshot> = Object.freeze({
  waitMinutes: 15,
  bedOccupancyPercent: 82,
  doctorsOnDuty: 24,
  activityScore: 70
});

const clamp = (value: number, low: number, high: number): number =>
  Math.max(low, Math.min(high, value));

const div = (a: number, b: number): number => Math.floor(a / b);

/**
 * Derives the dashboard metrics from the two live counts.
 *
 * Integer division runs before the surrounding arithmetic and clamping runs
 * last. Bed occupancy uses Math.round (half up); occupied/250*100 is always
 * a multiple of 0.4, so a tie never occurs.
 */
export function synthesizeStats({ doctorsOnDuty: d, appointmentsToday: a }: LiveCounts): StatsSnapshot {
  const occupiedBeds = Math.min(TOTAL_BEDS, 150 + div(d, 2) * 3);

  return {
    waitMinutes: clamp(10 + div(a, 3) - div(d, 5), 5, 45),
    bedOccupancyPercent: clamp(Math.round((occupiedBeds / TOTAL_BEDS) * 100), 0, 100),
    doctorsOnDuty: Math.max(12, d === 0 ? 24 : d),
    activityScore: clamp(60 + d * 2 - div(a, 4), 40, 95)
  };
}

function noteFor(error: StoreError): string {
  return `${error.kind}: ${error.message}`.slice(0, NOTE_MAX_LENGTH);
}

function asCount(result: StoreResult<number>, label: string): StoreResult<number> {
  if (!result.ok) {
    return result;
  }
  if (!Number.isInteger(result.value) || result.value < 0) {
    return err<StoreError>({ kind: 'QueryFailed', message: `invalid ${label} count: ${result.value}` });
  }
  return result;
}

export class StatsSynthesizer {
  constructor(
    private readonly store: DocumentStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  /** Issues both count queries concurrently. */
  async readCounts(): Promise<StoreResult<LiveCounts>> {
    const today = DateUtils.today(this.now());

    const [doctors, appointments] = await Promise.all([
      this.store.countDocuments('doctor', { on_duty: true }),
      this.store.countDocuments('appointment', { date: today })
    ]);

    const doctorsOnDuty = asCount(doctors, 'on-duty doctor');
    if (!doctorsOnDuty.ok) {
      return doctorsOnDuty;
    }
    const appointmentsToday = asCount(appointments, 'appointment');
    if (!appointmentsToday.ok) {
      return appointmentsToday;
    }

    return ok({
      doctorsOnDuty: doctorsOnDuty.value,
      appointmentsToday: appointmentsToday.value
    });
  }

  async snapshot(): Promise<StatsReport> {
    const counts = await this.readCounts();

    if (!counts.ok) {
      logger.warn('Serving fallback stats', { kind: counts.error.kind, reason: counts.error.message });
      return { ...FALLBACK_SNAPSHOT, note: noteFor(counts.error) };
    }

    logger.debug('Synthesized stats from live counts', counts.value);
    return synthesizeStats(counts.value);
  }
}
