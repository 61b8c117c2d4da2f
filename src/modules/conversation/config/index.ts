export { sessionConfig, validateSessionConfig, DEFAULT_SESSION_CONFIG } from './session.config';
