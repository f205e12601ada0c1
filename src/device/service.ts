/**
 * Device Module - Service Layer
 *
 * MQTT bridge to the button devices. Press topics are parsed and
 * dispatched to `onPress`; status updates are published back with QoS 1.
 */
import mqtt from "mqtt";
import type { MqttClient } from "mqtt";
import { type Result, err, ok } from "neverthrow";

import { config, deviceTopics } from "../config.js";
import { createLogger } from "../logger.js";
import type { DeviceDisplay, DisplayError, StatusUpdate } from "../status/index.js";
import type { ButtonPress } from "./schema.js";
import { buildStatusPayload, buildStatusTopic, parsePress } from "./transform.js";

const log = createLogger("device");

// =============================================================================
// Module State
// =============================================================================

let mqttClient: MqttClient | null = null;

export type DeviceEventHandlers = {
  onPress?: (press: ButtonPress) => void;
  onConnect?: () => void;
  onDisconnect?: () => void;
  onError?: (error: Error) => void;
};

let eventHandlers: DeviceEventHandlers = {};

// =============================================================================
// MQTT Client Management
// =============================================================================

/**
 * Connect to the broker and subscribe to press topics.
 *
 * @returns true if connection initiated successfully
 */
export function initializeDeviceClient(handlers: DeviceEventHandlers = {}): boolean {
  if (mqttClient) {
    log.warn("Device client already initialized");
    return true;
  }

  eventHandlers = handlers;

  log.info({ broker: config.MQTT_BROKER_URL }, "Connecting to MQTT broker...");

  try {
    mqttClient = mqtt.connect(config.MQTT_BROKER_URL, {
      reconnectPeriod: 5000,
      connectTimeout: 10000,
    });

    setupClientHandlers(mqttClient);

    return true;
  } catch (error) {
    log.error({ error }, "Failed to initialize device client");
    return false;
  }
}

function setupClientHandlers(client: MqttClient): void {
  client.on("connect", () => {
    log.info("Connected to MQTT broker");

    client.subscribe(deviceTopics.press, { qos: 1 }, (error) => {
      if (error) {
        log.error({ topic: deviceTopics.press, error: error.message }, "Subscribe failed");
        return;
      }
      log.info({ topic: deviceTopics.press }, "Subscribed to press topics");
    });

    eventHandlers.onConnect?.();
  });

  client.on("message", (topic, payload) => {
    handleMessage(topic, payload);
  });

  client.on("error", (error) => {
    log.error({ error: error.message }, "MQTT client error");
    eventHandlers.onError?.(error);
  });

  client.on("close", () => {
    log.warn("MQTT connection closed");
    eventHandlers.onDisconnect?.();
  });

  client.on("reconnect", () => {
    log.info("Reconnecting to MQTT broker...");
  });

  client.on("offline", () => {
    log.warn("MQTT client offline");
  });
}

function handleMessage(topic: string, payload: Buffer): void {
  const press = parsePress(topic, payload, deviceTopics.prefix, Date.now());
  if (!press) {
    log.debug({ topic, payload: payload.toString() }, "Ignoring unparseable press message");
    return;
  }

  log.info(
    { deviceId: press.deviceId, buttonIndex: press.buttonIndex },
    "Button press received",
  );
  eventHandlers.onPress?.(press);
}

// =============================================================================
// Status Publishing
// =============================================================================

async function publishStatus(update: StatusUpdate): Promise<Result<void, DisplayError>> {
  const client = mqttClient;
  if (!client?.connected) {
    return err({ message: "MQTT client not connected" });
  }

  const topic = buildStatusTopic(deviceTopics.prefix, update.deviceId, update.buttonIndex);

  try {
    await client.publishAsync(topic, buildStatusPayload(update), { qos: 1 });
    return ok(undefined);
  } catch (error) {
    return err({ message: error instanceof Error ? error.message : String(error) });
  }
}

/**
 * Display capability backed by the MQTT status topics.
 */
export const mqttDisplay: DeviceDisplay = {
  showStatus: publishStatus,
};

// =============================================================================
// Client Control
// =============================================================================

export function isConnected(): boolean {
  return mqttClient?.connected ?? false;
}

export async function disconnectDeviceClient(): Promise<void> {
  if (mqttClient) {
    log.info("Disconnecting MQTT client...");
    const client = mqttClient;
    mqttClient = null;
    eventHandlers = {};
    await client.endAsync();
  }
}
