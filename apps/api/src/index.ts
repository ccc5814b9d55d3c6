import { createServer } from "node:http";
import { HttpApiBuilder, HttpMiddleware } from "@effect/platform";
import { NodeHttpServer, NodeRuntime } from "@effect/platform-node";
import {
  AppConfig,
  LoggingLive,
  redactSensitiveConfig,
} from "@workspace/config";
import { ConfigProvider, Effect, Layer } from "effect";
import { assembleApp } from "./wiring.js";

/**
 * The graph is assembled in the server layer's scope: its resources are
 * released after the server has stopped.
 */
const ServerLive = Layer.unwrapScoped(
  Effect.gen(function* () {
    const config = yield* AppConfig;
    yield* Effect.logInfo("Starting ledger API").pipe(
      Effect.annotateLogs("config", redactSensitiveConfig(config)),
    );

    const app = yield* assembleApp(config);
    yield* Effect.logInfo(`Build order: ${app.order.join(", ")}`);

    return HttpApiBuilder.serve(HttpMiddleware.logger).pipe(
      Layer.provide(app.get("api")),
      Layer.provide(
        NodeHttpServer.layer(createServer, { port: config.api.port }),
      ),
    );
  }),
);

const program = Layer.launch(ServerLive).pipe(
  Effect.catchAllCause((cause) =>
    Effect.logFatal("Fatal error in main program", cause).pipe(
      Effect.flatMap(() => Effect.failCause(cause)),
    ),
  ),
  Effect.onInterrupt(() => Effect.logInfo("Shutting down ledger API")),
  Effect.provide(LoggingLive),
  Effect.withConfigProvider(ConfigProvider.fromEnv()),
);

NodeRuntime.runMain(program);
