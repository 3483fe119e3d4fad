import { Request, Response, NextFunction, RequestHandler } from 'express';
import Joi from 'joi';
import { Appointment, Doctor, Patient, ValidationIssue } from '@/types';
import { DateUtils } from './dateUtils';
import { createError } from './errorHandler';

export const DEFAULT_LIST_LIMIT = 20;
export const MAX_LIST_LIMIT = 100;

const isoDate = Joi.string().custom((value: string, helpers) => {
  if (!DateUtils.isIsoDate(value)) {
    return helpers.error('date.isoCalendar');
  }
  return value;
}).messages({
  'date.isoCalendar': '{{#label}} must be a calendar date in YYYY-MM-DD format'
});

const firstName = Joi.string().trim().min(1).max(80);
const lastName = Joi.string().trim().min(1).max(80);
const department = Joi.string().trim().min(2).max(120);
const phone = Joi.string().trim().min(7).max(20);
const email = Joi.string().trim().email();

export const patientSchema = Joi.object<Patient>({
  first_name: firstName.required(),
  last_name: lastName.required(),
  email: email.optional(),
  phone: phone.optional(),
  dob: isoDate.optional(),
  blood_group: Joi.string().trim().optional()
});

export const doctorSchema = Joi.object<Doctor>({
  first_name: firstName.required(),
  last_name: lastName.required(),
  department: department.required(),
  email: email.optional(),
  phone: phone.optional(),
  on_duty: Joi.boolean().default(true)
});

export const appointmentSchema = Joi.object<Appointment>({
  name: Joi.string().trim().min(1).max(160).required(),
  email: email.required(),
  phone: phone.required(),
  department: department.required(),
  date: isoDate.required(),
  notes: Joi.string().max(500).optional(),
  status: Joi.string().valid('requested', 'confirmed', 'completed', 'cancelled').default('requested'),
  created_for: Joi.string().isoDate().optional()
});

const listQuerySchema = Joi.object<{ limit: number }>({
  limit: Joi.number().integer().min(1).max(MAX_LIST_LIMIT).default(DEFAULT_LIST_LIMIT)
});

export const validatePatient = createValidator(patientSchema);
export const validateDoctor = createValidator(doctorSchema);
export const validateAppointment = createValidator(appointmentSchema);

function toIssues(error: Joi.ValidationError): ValidationIssue[] {
  return error.details.map(detail => ({
    field: detail.path.join('.'),
    message: detail.message,
    value: detail.context?.value
  }));
}

function createValidator<T>(schema: Joi.ObjectSchema<T>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const { error, value } = schema.validate(req.body ?? {}, {
      abortEarly: false,
      stripUnknown: true
    });

    if (error) {
      next(createError('Validation failed', 400, 'VALIDATION_ERROR', toIssues(error)));
      return;
    }

    req.body = value;
    next();
  };
}

/** Reads `?limit=` for list endpoints; throws a 400 AppError when invalid. */
export function parseListLimit(query: Request['query']): number {
  const { error, value } = listQuerySchema.validate(
    { limit: query.limit },
    { abortEarly: false }
  );

  if (error) {
    throw createError('Invalid query parameters', 400, 'VALIDATION_ERROR', toIssues(error));
  }

  return value.limit;
}
