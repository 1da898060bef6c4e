export {
  BASE_URL_ENV,
  loadProjectId,
  loadSettingsFile,
  loadSettingsFromEnv,
  NETWORK_ENV,
  PROJECT_ID_ENV,
  TIMEOUT_ENV,
} from './settings';
