import { createContainer, asClass, asFunction, asValue, InjectionMode, AwilixContainer } from 'awilix';
import { EnvConfig } from './env';
import { CryptoService } from '../services/crypto.service';
import { JWTService } from '../services/jwt.service';
import { AuthService } from '../services/auth.service';
import { QrService } from '../services/qr.service';
import { TicketPdfService } from '../services/ticket-pdf.service';
import { TicketService } from '../services/ticket.service';
import { ScanService } from '../services/scan.service';
import { JsonStore } from '../storage/json-store';
import { UserModel } from '../models/user.model';
import { TicketModel } from '../models/ticket.model';
import { AttendanceModel } from '../models/attendance.model';

export interface Cradle {
  // Config
  config: EnvConfig;

  // Storage
  store: JsonStore;
  userModel: UserModel;
  ticketModel: TicketModel;
  attendanceModel: AttendanceModel;

  // Services
  cryptoService: CryptoService;
  jwtService: JWTService;
  authService: AuthService;
  qrService: QrService;
  ticketPdfService: TicketPdfService;
  ticketService: TicketService;
  scanService: ScanService;
}

export type Container = AwilixContainer<Cradle>;

export function createDependencyContainer(config: EnvConfig): Container {
  const container = createContainer<Cradle>({
    injectionMode: InjectionMode.CLASSIC,
  });

  container.register({
    // Config
    config: asValue(config),

    // Storage
    store: asFunction((cryptoService: CryptoService) => new JsonStore(config.DATA_DIR, cryptoService)).singleton(),
    userModel: asClass(UserModel).singleton(),
    ticketModel: asClass(TicketModel).singleton(),
    attendanceModel: asClass(AttendanceModel).singleton(),

    // Core Services
    cryptoService: asClass(CryptoService).singleton(),
    jwtService: asClass(JWTService).singleton(),
    qrService: asClass(QrService).singleton(),
    ticketPdfService: asFunction(() => new TicketPdfService(config.EVENT)).singleton(),
    authService: asFunction(
      (userModel: UserModel, cryptoService: CryptoService, jwtService: JWTService) =>
        new AuthService(userModel, cryptoService, jwtService, config)
    ).singleton(),
    ticketService: asFunction(
      (
        ticketModel: TicketModel,
        userModel: UserModel,
        attendanceModel: AttendanceModel,
        cryptoService: CryptoService,
        qrService: QrService,
        ticketPdfService: TicketPdfService
      ) =>
        new TicketService(ticketModel, userModel, attendanceModel, cryptoService, qrService, ticketPdfService, config)
    ).singleton(),
    scanService: asClass(ScanService).singleton(),
  });

  return container;
}
