import Joi from 'joi';

// Empty QR data is a scan outcome, not a request error
export const verifyScanSchema = Joi.object({
  qrData: Joi.string().allow('').max(4096).default(''),
}).unknown(false);

export const manualEntrySchema = Joi.object({
  code: Joi.string().trim().allow('').max(64).default(''),
}).unknown(false);
