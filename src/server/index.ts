//index.ts

import 'dotenv/config';
import { ApplicationBootstrapper } from './ApplicationBootstrapper';
import { ConfigurationError } from './config';

try {
  ApplicationBootstrapper.bootstrapApplication();
} catch (err) {
  if (err instanceof ConfigurationError) {
    console.error(err.describe());
  } else {
    console.error('Failed to start application:', err instanceof Error ? err.stack ?? err.message : err);
  }
  process.exit(1);
}

process.on('unhandledRejection', (err) => {
  console.error('unhandledRejection', err);
});
