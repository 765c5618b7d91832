export {
  AUTH_TOKEN_FILE,
  BASE_URL_FILE,
  PROVIDER_MARKER_PATH,
  formatEnvExports,
  formatEnvFile,
  loadProviderCredentials,
  writeProviderMarker,
} from './provider-state.js';
export type { ProviderCredentials } from './provider-state.js';
