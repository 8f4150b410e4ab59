export * from "./channel.js";
export * from "./config.js";
export * from "./decoder/buffers.js";
export * from "./decoder/callReader.js";
export * from "./decoder/calls.js";
export * from "./decoder/controlCodes.js";
export * from "./decoder/decoder.js";
export * from "./demux.js";
export * from "./errors.js";
export * from "./lineParser.js";
export * from "./lineSource.js";
export * from "./render.js";
export * from "./stats.js";
export * from "./tables.js";
export * from "./utils.js";
