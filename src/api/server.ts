import {ApolloServer} from "@apollo/server";
import {startStandaloneServer} from "@apollo/server/standalone";
import {createLogger} from "../shared/logger";
import {ApiContext, resolvers} from "./resolvers";
import {typeDefs} from "./schema";

const logger = createLogger("statusApi");

export function createServer(): ApolloServer<ApiContext> {
  return new ApolloServer<ApiContext>({typeDefs, resolvers});
}

/**
 * Serves the status API over HTTP. Resolves with the URL once listening.
 */
export async function startStatusApi(
  server: ApolloServer<ApiContext>,
  context: ApiContext,
  port: number
): Promise<string> {
  const {url} = await startStandaloneServer(server, {
    listen: {port},
    context: async () => context
  });
  logger.info("status-api-listening", {url});
  return url;
}
