import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { openDatabase } from "./db/connection.js";
import { createAdapter, resolveAdapterKind } from "./execution/adapterSelection.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { PostgresStore } from "./store/postgresStore.js";

async function main(): Promise<void> {
  const autoSchema = (process.env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false";
  const adapter = createAdapter(resolveAdapterKind(process.env.PIPELINE_ADAPTER));

  const database = await openDatabase({ databaseUrl: process.env.DATABASE_URL, autoSchema });
  const store = new PostgresStore(database.db);

  const server = createGatewayServer({
    store,
    adapter,
    echo: process.env.PIPELINE_ECHO === "1",
    cacheInWorkdir: database.mode === "pg-mem"
  });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`pipeline gateway ready (db=${database.mode}, adapter=${adapter.kind})`);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
