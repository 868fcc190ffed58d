/**
 * kasa-lan - Library Entry Point
 *
 * LAN client for TP-Link smart plugs and bulbs:
 * - codec: the autokey cipher applied to every payload
 * - transport: length-prefixed TCP frames and UDP broadcast
 * - protocol: command builders and response extraction
 * - capabilities: switch, dimmer, energy meter and housekeeping contracts
 * - device: recognized hardware variants and their handles
 * - discovery: broadcast discovery of devices on the local network
 */
export * from "./codec/index.js";
export * from "./transport/index.js";
export * from "./protocol/index.js";
export * from "./capabilities/index.js";
export * from "./device/index.js";
export * from "./discovery/index.js";
