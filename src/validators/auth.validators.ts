import Joi from 'joi';
import { LoginInput, StaffAccountInput } from '../types/entry-pass.types';

// ============================================
// AUTHENTICATION SCHEMAS
// ============================================

export const loginSchema = Joi.object<LoginInput>({
  username: Joi.string().trim().max(64).required(),
  password: Joi.string().max(128).required(),
}).unknown(false);

export const createStaffSchema = Joi.object<StaffAccountInput>({
  username: Joi.string()
    .trim()
    .pattern(/^[A-Za-z0-9._-]{3,32}$/)
    .required()
    .messages({
      'string.pattern.base': 'username must be 3-32 letters, digits, dots, dashes or underscores',
    }),
  password: Joi.string().min(8).max(128).required(),
  role: Joi.string().valid('admin', 'scanner').required(),
}).unknown(false);
