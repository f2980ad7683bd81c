import { FastifyRequest } from 'fastify';
import Joi from 'joi';
import { FieldError, ValidationError } from '../errors';

const VALIDATION_OPTIONS: Joi.ValidationOptions = {
  abortEarly: false,
  stripUnknown: true,
};

export function toFieldErrors(error: Joi.ValidationError): FieldError[] {
  return error.details.map((detail) => ({
    field: detail.path.join('.'),
    message: detail.message,
  }));
}

/**
 * Validates `value` against `schema` and returns the converted value, or
 * throws `ValidationError` listing every failing field.
 */
export function assertValid<T>(schema: Joi.ObjectSchema<T>, value: unknown): T {
  const result = schema.validate(value, VALIDATION_OPTIONS);
  if (result.error) {
    const errors = toFieldErrors(result.error);
    throw new ValidationError(errors.map((e) => e.message).join(', '), errors);
  }
  return result.value;
}

export function validate(schema: Joi.ObjectSchema, source: 'body' | 'query' | 'params' = 'body') {
  return async (request: FastifyRequest) => {
    // A POST without a payload arrives as undefined; schemas see an empty object
    const dataToValidate = source === 'body' ? request.body ?? {} :
                           source === 'query' ? request.query :
                           request.params;

    const validated: unknown = assertValid(schema, dataToValidate);

    if (source === 'body') {
      request.body = validated;
    } else if (source === 'query') {
      request.query = validated;
    } else {
      request.params = validated;
    }
  };
}
