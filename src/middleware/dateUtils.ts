const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export class DateUtils {
  /** UTC calendar date as `YYYY-MM-DD`. */
  static toIsoDate(date: Date): string {
    return date.toISOString().slice(0, 10);
  }

  static today(now: Date = new Date()): string {
    return this.toIsoDate(now);
  }

  /** True for a real calendar date written as `YYYY-MM-DD`. */
  static isIsoDate(value: string): boolean {
    const match = ISO_DATE.exec(value);
    if (!match) {
      return false;
    }

    const [, year, month, day] = match.map(Number);
    const date = new Date(Date.UTC(year, month - 1, day));
    return (
      date.getUTCFullYear() === year &&
      date.getUTCMonth() === month - 1 &&
      date.getUTCDate() === day
    );
  }
}
