/**
 * Ajv validation instance with schema validators
 * Configuration files must validate before anything is built from them
 */

import Ajv2020, { type ErrorObject, type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { loadSchema } from './schema_loader';
import type { AppConfigFile, IndicatorsFile } from '@/types/config_files';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// Add format validators (date, email, uri, etc.)
addFormats(ajv);

// Lazy-loaded validators
let appConfigValidator: ValidateFunction<AppConfigFile> | null = null;
let indicatorsValidator: ValidateFunction<IndicatorsFile> | null = null;

export function getAppConfigValidator(dir?: string): ValidateFunction<AppConfigFile> {
  if (!appConfigValidator) {
    appConfigValidator = ajv.compile<AppConfigFile>(loadSchema('app', dir));
  }
  return appConfigValidator;
}

export function getIndicatorsValidator(dir?: string): ValidateFunction<IndicatorsFile> {
  if (!indicatorsValidator) {
    indicatorsValidator = ajv.compile<IndicatorsFile>(loadSchema('indicators', dir));
  }
  return indicatorsValidator;
}

export interface ValidationResult<T> {
  valid: boolean;
  data: T | null;
  errors: string[] | null;
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return errors?.map((e) => `${e.instancePath || 'root'}: ${e.message ?? e.keyword}`) ?? [
    'Unknown validation error',
  ];
}

export function validateAppConfig(data: unknown, dir?: string): ValidationResult<AppConfigFile> {
  const validate = getAppConfigValidator(dir);
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }
  return { valid: false, data: null, errors: formatErrors(validate.errors) };
}

export function validateIndicatorsConfig(
  data: unknown,
  dir?: string
): ValidationResult<IndicatorsFile> {
  const validate = getIndicatorsValidator(dir);
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }
  return { valid: false, data: null, errors: formatErrors(validate.errors) };
}
