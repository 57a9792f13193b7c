const env = process.env;

const port = Number(env.PORT ?? 3000);
if (!Number.isInteger(port) || port <= 0) {
  throw new Error(`Invalid PORT '${env.PORT}'`);
}

const store = env.STORE ?? "memory";
if (store !== "memory" && store !== "mongo") {
  throw new Error(`Invalid STORE '${store}', expected 'memory' or 'mongo'`);
}

export const config = {
  port,
  development: env.NODE_ENV === "development",
  store,

  api: {
    name: env.API_NAME ?? "v1",
    basePath: env.API_BASE_PATH ?? "/api",
  },

  db: {
    user: env.DB_USER,
    password: env.DB_PASSWORD,
    name: env.DB_NAME,
    host: env.DB_HOST ?? "localhost",
    port: env.DB_PORT ?? "27017",
  },

  admin:
    env.ADMIN_USERNAME && env.ADMIN_PASSWORD
      ? { username: env.ADMIN_USERNAME, password: env.ADMIN_PASSWORD }
      : null,
};
