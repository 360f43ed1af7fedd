export { LoggerModule, buildPinoParams } from './logger.module';
export { AppLoggerService } from './app-logger.service';
