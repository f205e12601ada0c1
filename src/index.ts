/**
 * Button Relay - Application Entry Point
 *
 * Wires the pipeline to its real collaborators:
 * - MQTT device bridge (presses in, status out)
 * - Google Sheets (button table + log rows)
 * - Slack (chat messages and their follow-up)
 * and serves the HTTP API with @hono/node-server.
 */
import { serve } from "@hono/node-server";
import { err } from "neverthrow";
import { createApp } from "./api/app.js";
import { type ConfigSource, createSheetsConfigSource } from "./button-config/index.js";
import {
  config,
  getFollowUpConfig,
  getSheetsConfig,
  getSinkRetryConfig,
  getSlackConfig,
  getTransportConfig,
} from "./config.js";
import {
  disconnectDeviceClient,
  initializeDeviceClient,
  isConnected,
  mqttDisplay,
} from "./device/index.js";
import { buildInstructions, createFollowUpScheduler } from "./follow-up/index.js";
import { createLogger, logOperationFailed } from "./logger.js";
import { createButtonRelay, formatPressError } from "./pipeline/index.js";
import { createSheetsClient } from "./sheets/index.js";
import { createLogSink, createMessageSink } from "./sinks/index.js";

const log = createLogger("api");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  BUTTON RELAY");
console.log("========================================");
console.log("");

const transportConfig = getTransportConfig();
const slackConfig = getSlackConfig();
const sheetsConfig = getSheetsConfig();
const followUpConfig = getFollowUpConfig();

log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    mqttBroker: config.MQTT_BROKER_URL,
    topicPrefix: config.MQTT_TOPIC_PREFIX,
    configTab: config.CONFIG_TAB,
    configTtlMs: config.CONFIG_TTL_MS,
    maxAttempts: transportConfig.maxAttempts,
    ackPolicy: config.ACK_POLICY,
  },
  "Configuration loaded",
);

log.info(slackConfig ? "Slack messages: ENABLED" : "Slack messages: DISABLED");
log.info(sheetsConfig ? "Google Sheets: ENABLED" : "Google Sheets: DISABLED");
log.info(
  followUpConfig
    ? `Message follow-up: ENABLED (${followUpConfig.windowMs}ms)`
    : "Message follow-up: DISABLED",
);

// =============================================================================
// PIPELINE
// =============================================================================

const sheetsClient = sheetsConfig ? createSheetsClient(sheetsConfig) : null;

const followUp = followUpConfig
  ? createFollowUpScheduler({ config: followUpConfig, sheets: sheetsClient })
  : null;

const unconfiguredSource: ConfigSource = {
  fetchAll: async () => err({ message: "Google Sheets is not configured" }),
};

const relay = createButtonRelay({
  configSource: sheetsClient
    ? createSheetsConfigSource(sheetsClient, config.CONFIG_TAB)
    : unconfiguredSource,
  configTtlMs: config.CONFIG_TTL_MS,
  messageSink: createMessageSink(
    slackConfig,
    followUp && followUpConfig
      ? { footer: buildInstructions(followUpConfig.windowMs), onPosted: followUp.schedule }
      : {},
  ),
  logSink: createLogSink(sheetsClient),
  display: mqttDisplay,
  transport: transportConfig,
  visibilityTimeoutMs: transportConfig.visibilityTimeoutMs,
  sinkRetry: getSinkRetryConfig(),
  sinkTimeoutMs: config.SINK_TIMEOUT_MS,
  ackPolicy: config.ACK_POLICY,
});

initializeDeviceClient({
  onPress: (press) => {
    relay
      .handlePress(press.deviceId, press.buttonIndex, press.capturedAt)
      .then((result) => {
        if (result.isErr()) {
          log.debug(
            { deviceId: press.deviceId, error: formatPressError(result.error) },
            "MQTT press not accepted",
          );
        }
      })
      .catch((error: unknown) => {
        logOperationFailed(log, "handlePress", error, { deviceId: press.deviceId });
      });
  },
});

relay.start();

// =============================================================================
// HONO SERVER
// =============================================================================

const app = createApp({ relay, isDeviceConnected: isConnected });

const server = serve(
  { fetch: app.fetch, port: config.PORT, hostname: "0.0.0.0" },
  (info) => {
    log.info(
      { port: info.port, env: config.NODE_ENV, appName: config.APP_NAME },
      `🚀 ${config.APP_NAME} listening on port ${info.port}`,
    );
  },
);

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = async (signal: string): Promise<void> => {
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  server.close();
  await relay.stop();
  followUp?.stop();
  await disconnectDeviceClient();

  log.info("Shutdown complete");
  process.exit(0);
};

const onSignal = (signal: string) => {
  shutdown(signal).catch((error: unknown) => {
    logOperationFailed(log, "shutdown", error);
    process.exit(1);
  });
};

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));
