/** Hono environment shared by the app, its sub-routers and middleware. */
export type ApiEnv = {
  Variables: {
    requestId: string;
  };
};
