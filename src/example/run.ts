import { createTransportClient, loadTransportConfig } from "../config/index.js";
import { getKey, setKey, versionRequest } from "../requests/index.js";
import { RetryWithTimeout } from "../transport/index.js";

// KV_ENDPOINTS=http://127.0.0.1:2379,http://127.0.0.1:22379 node dist/example/run.js
async function main(): Promise<void> {
  const client = createTransportClient(loadTransportConfig(), {
    retryPolicy: new RetryWithTimeout(100, 5_000),
  });

  try {
    const version = await client.send(versionRequest());
    console.log("version", version);

    await client.send(setKey("example/greeting", "hello world", { ttl: 60 }));
    const result = await client.send(getKey("example/greeting"));
    console.log(`${result.node.key} = ${result.node.value}`);

    for (const endpoint of client.getStatus()) {
      console.log(`  - ${endpoint.url} (healthy: ${endpoint.healthy})`);
    }
  } finally {
    client.close();
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
