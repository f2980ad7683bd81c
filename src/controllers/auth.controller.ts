import { FastifyReply, FastifyRequest } from 'fastify';
import { AuthService } from '../services/auth.service';
import { requireUser } from '../middleware/auth.middleware';
import { LoginInput } from '../types/entry-pass.types';

export class AuthController {
  constructor(private authService: AuthService) {}

  async login(request: FastifyRequest<{ Body: LoginInput }>, reply: FastifyReply) {
    const result = await this.authService.login(request.body.username, request.body.password);
    return reply.send(result);
  }

  async logout(request: FastifyRequest, reply: FastifyReply) {
    const user = requireUser(request);
    this.authService.logout({ jti: user.jti, exp: user.exp, sub: user.id });
    return reply.status(204).send();
  }

  async me(request: FastifyRequest, reply: FastifyReply) {
    const user = requireUser(request);
    return reply.send({
      id: user.id,
      username: user.username,
      role: user.role,
      expiresAt: new Date(user.exp * 1000).toISOString(),
    });
  }
}
