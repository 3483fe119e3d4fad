import { Router } from 'express';
import { AppConfig } from '@/config/env';
import { StatsSynthesizer } from '@/services/StatsSynthesizer';
import { validateAppointment, validateDoctor, validatePatient } from '@/middleware/validation';
import { DocumentStore } from '@/types';
import { createDocumentRouter } from './documents';
import { createStatsRouter } from './stats';
import { createSystemRouter } from './system';

export interface ApiDependencies {
  store: DocumentStore;
  config: AppConfig;
  synthesizer?: StatsSynthesizer;
}

export function createApiRouter({ store, config, synthesizer }: ApiDependencies): Router {
  const router = Router();

  router.use('/', createSystemRouter(store, config));
  router.use('/patients', createDocumentRouter('patient', validatePatient, store));
  router.use('/doctors', createDocumentRouter('doctor', validateDoctor, store));
  router.use('/appointments', createDocumentRouter('appointment', validateAppointment, store));
  router.use('/stats', createStatsRouter(synthesizer ?? new StatsSynthesizer(store)));

  return router;
}
