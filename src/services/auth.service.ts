import { v4 as uuidv4 } from 'uuid';
import { UserModel, toPublicUser } from '../models/user.model';
import { CryptoService } from './crypto.service';
import { JWTService, AccessTokenPayload } from './jwt.service';
import { PublicUser, Role, UserRecord } from '../types/entry-pass.types';
import { InvalidCredentialsError } from '../errors';
import { createLogger } from '../utils/logger';

const log = createLogger('auth');

export interface AdminSeed {
  ADMIN_USERNAME: string;
  ADMIN_PASSWORD: string;
}

export interface LoginResult {
  token: string;
  username: string;
  role: Role;
  expiresAt: string;
}

// Hashed at the configured cost and checked for unknown usernames
const DUMMY_PASSWORD = 'unknown-user-placeholder';

export class AuthService {
  private dummyHash?: Promise<string>;

  constructor(
    private readonly userModel: UserModel,
    private readonly cryptoService: CryptoService,
    private readonly jwtService: JWTService,
    private readonly adminSeed: AdminSeed
  ) {}

  /**
   * Creates the configured admin account when no account with that
   * username exists yet. Returns true when an account was created.
   */
  async ensureAdmin(): Promise<boolean> {
    const existing = await this.userModel.findByUsername(this.adminSeed.ADMIN_USERNAME);
    if (existing) {
      return false;
    }

    await this.userModel.create({
      id: uuidv4(),
      username: this.adminSeed.ADMIN_USERNAME,
      passwordHash: await this.cryptoService.hashPassword(this.adminSeed.ADMIN_PASSWORD),
      role: 'admin',
      createdAt: new Date().toISOString(),
      createdBy: 'system',
    });
    log.info({ username: this.adminSeed.ADMIN_USERNAME }, 'Bootstrap admin account created');
    return true;
  }

  async login(username: string, password: string): Promise<LoginResult> {
    const user = await this.userModel.findByUsername(username.trim());
    const hash = user ? user.passwordHash : await this.getDummyHash();
    const matches = await this.cryptoService.verifyPassword(password, hash);

    if (!user || !matches) {
      log.warn({ username }, 'Failed login attempt');
      throw new InvalidCredentialsError();
    }

    const { token, payload } = this.jwtService.sign({ id: user.id, username: user.username, role: user.role });
    log.info({ userId: user.id, role: user.role }, 'User logged in');

    return {
      token,
      username: user.username,
      role: user.role,
      expiresAt: new Date(payload.exp * 1000).toISOString(),
    };
  }

  logout(principal: Pick<AccessTokenPayload, 'jti' | 'exp' | 'sub'>): void {
    this.jwtService.revoke(principal);
    log.info({ userId: principal.sub }, 'User logged out');
  }

  async createStaffAccount(
    username: string,
    password: string,
    role: Extract<Role, 'admin' | 'scanner'>,
    createdBy: string
  ): Promise<PublicUser> {
    const user: UserRecord = {
      id: uuidv4(),
      username: username.trim(),
      passwordHash: await this.cryptoService.hashPassword(password),
      role,
      createdAt: new Date().toISOString(),
      createdBy,
    };
    await this.userModel.create(user);
    log.info({ username: user.username, role, createdBy }, 'Staff account created');
    return toPublicUser(user);
  }

  async listTeamUsers(): Promise<PublicUser[]> {
    const users = await this.userModel.findByRole('user');
    return users.map(toPublicUser);
  }

  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      this.dummyHash = this.cryptoService.hashPassword(DUMMY_PASSWORD).catch((error: unknown) => {
        this.dummyHash = undefined;
        throw error;
      });
    }
    return this.dummyHash;
  }
}
