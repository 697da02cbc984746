export * from './engine-config.type';
export * from './engine-config.constants';
export { EngineConfigLoader } from './engine-config.loader';
export { EngineConfigModule } from './engine-config.module';
export { loggerConfig } from './logger.config';
