import {AppEffects} from '../pure/effects';
import {CrmContext, resolvers} from './resolvers';
import {typeDefs} from './schema';
import {ApolloServer} from '@apollo/server';
import {expressMiddleware} from '@apollo/server/express4';
import express, {Express} from 'express';

export function createApolloServer(): ApolloServer<CrmContext> {
  return new ApolloServer<CrmContext>({typeDefs, resolvers});
}

/**
 * Build the express app: GraphQL at /graphql and a health check at /health.
 * The returned Apollo server is started; stop it on shutdown.
 */
export async function createApp(
  effects: AppEffects
): Promise<{ app: Express; apollo: ApolloServer<CrmContext> }> {
  const apollo = createApolloServer();
  await apollo.start();

  const app = express();

  app.get('/health', (_req, res) => {
    res.json({status: 'healthy', service: 'crm-api'});
  });

  app.use(
    '/graphql',
    express.json(),
    expressMiddleware(apollo, {
      context: async () => ({effects}),
    })
  );

  return {app, apollo};
}
