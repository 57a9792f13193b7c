import { BasicAuthentication } from "@jquest/resources-core";
import { memorySupplier } from "@jquest/memory-store-adapter";
import { ResourceServer } from "@jquest/resources-server";
import express from "express";
import { createApi } from "../api";
import { accountVerifier } from "./auth";
import { config } from "./config";
import { connect, mongoSupplier } from "./database";
import { seedSuperuser } from "./seed";

const supplier = config.store === "mongo" ? mongoSupplier() : memorySupplier();

const api = createApi({
  supplier,
  authentication: new BasicAuthentication(accountVerifier(supplier)),
  apiName: config.api.name,
  basePath: config.api.basePath,
});

const app = express();
app.use(api.basePath, new ResourceServer(api).router());

(async () => {
  if (config.store === "mongo") await connect();

  if (config.admin && (await seedSuperuser(supplier, config.admin))) {
    console.log(`> Created superuser ${config.admin.username}`);
  }

  app.listen(config.port, () => {
    console.log(`> Server listening on http://localhost:${config.port}${api.urlPrefix}/`);
  });
})().catch((error) => {
  console.error("Failed to start the server:", error);
  process.exit(1);
});
