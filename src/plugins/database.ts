import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';

import { db, closeDatabase, pingDatabase, type Database } from '../shared/database/client.js';

declare module 'fastify' {
  interface FastifyInstance {
    db: Database;
    pingDatabase: () => Promise<boolean>;
  }
}

// eslint-disable-next-line @typescript-eslint/require-await
const databasePlugin: FastifyPluginAsync = async (fastify) => {
  fastify.decorate('db', db);
  fastify.decorate('pingDatabase', pingDatabase);
  fastify.log.info('Database client registered');

  fastify.addHook('onClose', async () => {
    fastify.log.info('Closing database connection...');
    await closeDatabase();
    fastify.log.info('Database connection closed');
  });
};

export default fp(databasePlugin, {
  name: 'database',
});
