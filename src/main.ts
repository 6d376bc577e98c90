/**
 * API STARTUP SCRIPT
 *
 * Connects to PostgreSQL, applies the schema and serves the GraphQL API.
 *
 * Run this with: npm start
 */
import {makeAppEffects} from './effects/EffectsFactory';
import {loadConfigFromEnv} from './effects/config';
import {createApp} from './api/server';
import {Server} from 'http';

async function main(): Promise<void> {
  console.log('🚀 Starting CRM API server...\n');

  const config = loadConfigFromEnv();
  const appEffects = await makeAppEffects(config);
  const {app, apollo} = await createApp(appEffects);

  console.log('📋 Configuration:');
  console.log(`   - Database: ${config.database.host}:${config.database.port}/${config.database.database}`);
  console.log(`   - API port: ${config.api.port}`);
  console.log('');

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(config.api.port, () => {
      console.log(`🌐 API server started on port ${config.api.port}`);
      console.log(`   - GraphQL: POST http://localhost:${config.api.port}/graphql`);
      console.log(`   - Health check: GET http://localhost:${config.api.port}/health`);
      console.log('');
      resolve(listening);
    });
  });

  const shutdown = async (signal: string): Promise<void> => {
    console.log(`\n⏸️  Received ${signal}, shutting down gracefully...`);
    await new Promise<void>((resolve, reject) => server.close(error => error ? reject(error) : resolve()));
    await apollo.stop();
    await appEffects.close();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        console.error('❌ Shutdown failed:', error);
        process.exit(1);
      });
    });
  }
}

main().catch((error) => {
  console.error('💥 Failed to start API server:', error);
  process.exit(1);
});
