export * from './api';
export * from './database';
export * from './store';

export type AppointmentStatus =
  | 'requested'
  | 'confirmed'
  | 'completed'
  | 'cancelled';

export interface Patient {
  first_name: string;
  last_name: string;
  email?: string;
  phone?: string;
  dob?: string; // YYYY-MM-DD
  blood_group?: string; // e.g. O+, A-
}

export interface Doctor {
  first_name: string;
  last_name: string;
  department: string;
  email?: string;
  phone?: string;
  on_duty: boolean;
}

export interface Appointment {
  name: string;
  email: string;
  phone: string;
  department: string;
  date: string; // YYYY-MM-DD
  notes?: string;
  status: AppointmentStatus;
  created_for?: string; // ISO datetime, once a slot is allocated
}

/** Live counts the stats heuristics are derived from. */
export interface LiveCounts {
  doctorsOnDuty: number;
  appointmentsToday: number;
}

export interface StatsSnapshot {
  waitMinutes: number;
  bedOccupancyPercent: number;
  doctorsOnDuty: number;
  activityScore: number;
}

export interface StatsReport extends StatsSnapshot {
  /** Present only when the fallback snapshot was served. */
  note?: string;
}
