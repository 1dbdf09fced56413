export { APP_VERSION } from './app.constants';
export { Environment, EnvironmentVariables, validate } from './env.validation';
export { setupSwagger } from './swagger.config';
