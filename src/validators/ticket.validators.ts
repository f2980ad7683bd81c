import Joi from 'joi';
import { CreateTicketInput } from '../types/entry-pass.types';

export const MIN_TEAM_SIZE = 2;
export const MAX_TEAM_SIZE = 4;

// Ticket IDs are 8 upper-case hex characters; lower case is accepted on input
const ticketIdField = Joi.string()
  .trim()
  .uppercase()
  .pattern(/^[0-9A-F]{8}$/)
  .messages({
    'string.pattern.base': 'ticketId must be 8 hexadecimal characters',
  });

export const createTicketSchema = Joi.object<CreateTicketInput>({
  teamName: Joi.string().trim().min(1).max(100).required(),
  collegeName: Joi.string().trim().min(1).max(150).required(),
  teamLeaderEmail: Joi.string().trim().email().max(255).required(),
  teamSize: Joi.number().integer().min(MIN_TEAM_SIZE).max(MAX_TEAM_SIZE).default(3),
  slot: Joi.string().trim().max(100).allow('').optional(),
  eventName: Joi.string().trim().max(100).allow('').optional(),
}).unknown(false);

export const ticketIdParamsSchema = Joi.object({
  ticketId: ticketIdField.required(),
});
