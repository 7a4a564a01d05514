import 'dotenv/config';

import { startServer } from './server.js';

startServer().catch((error) => {
  // eslint-disable-next-line no-console
  console.error('Failed to start tenant gate:', error);
  process.exit(1);
});
