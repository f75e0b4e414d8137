import fp from "fastify-plugin";
import { type ActivityStore, createActivityStore } from "../../database/index.js";

declare module "fastify" {
  interface FastifyInstance {
    store: ActivityStore;
  }
}

export interface StorePluginOptions {
  store?: ActivityStore;
}

export const storePlugin = fp<StorePluginOptions>(async function storePlugin(app, opts) {
  const store = opts.store ?? createActivityStore();
  app.decorate("store", store);
  app.log.info({ activities: store.snapshot().size }, "activity store ready");
});
