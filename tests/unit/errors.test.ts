import {
  AppError,
  ConflictError,
  InternalError,
  InvalidCredentialsError,
  StorageError,
  TicketNotFoundError,
  ValidationError,
} from '../../src/errors';

describe('AppError', () => {
  it('keeps the subclass name and prototype', () => {
    const error = new TicketNotFoundError('ABCD1234');

    expect(error).toBeInstanceOf(TicketNotFoundError);
    expect(error).toBeInstanceOf(AppError);
    expect(error.name).toBe('TicketNotFoundError');
    expect(error.statusCode).toBe(404);
    expect(error.code).toBe('TICKET_NOT_FOUND');
    expect(error.message).toBe('Ticket ABCD1234 not found');
  });

  it('renders RFC 7807 problem details', () => {
    const problem = new ConflictError('Username admin already exists', 'USERNAME_TAKEN').toProblemDetails('/admin/staff');

    expect(problem).toEqual({
      type: 'https://httpstatuses.com/409',
      title: 'Conflict',
      status: 409,
      detail: 'Username admin already exists',
      code: 'USERNAME_TAKEN',
      instance: '/admin/staff',
    });
  });

  it('splits camel-case names into the title', () => {
    expect(new InvalidCredentialsError().toProblemDetails().title).toBe('Invalid Credentials');
  });

  it('merges details into the problem body', () => {
    const errors = [{ field: 'teamName', message: '"teamName" is required' }];
    const problem = new ValidationError('"teamName" is required', errors).toProblemDetails();

    expect(problem.status).toBe(400);
    expect(problem.code).toBe('VALIDATION_ERROR');
    expect(problem.errors).toEqual(errors);
  });

  it('names the collection on storage errors', () => {
    const problem = new StorageError('Collection tickets is unreadable', 'tickets').toProblemDetails();

    expect(problem.status).toBe(500);
    expect(problem.collection).toBe('tickets');
  });

  it('marks internal errors as non-operational', () => {
    const error = new InternalError('Failed to generate QR code', 'QR_GENERATION_FAILED');

    expect(error.isOperational).toBe(false);
    expect(error.toProblemDetails().title).toBe('Internal');
  });
});
