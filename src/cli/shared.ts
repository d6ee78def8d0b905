import type { ChatwootClient } from '../lib/chatwoot-client.js';

type Colorizer = (text: string | number) => string;

export interface CliColors {
  primary: Colorizer;
  secondary: Colorizer;
  success: Colorizer;
  error: Colorizer;
  warning: Colorizer;
  info: Colorizer;
  muted: Colorizer;
  highlight: Colorizer;
}

export interface CliContext {
  colors: CliColors;
  json: boolean;
  verbose: boolean;
  configPath: string;
  env: NodeJS.ProcessEnv;
  // Built lazily so commands like `config path` work without credentials
  createClient: () => ChatwootClient;
}
