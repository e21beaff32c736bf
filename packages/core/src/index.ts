export const pkg = "@mirrorsync/core";

export * from "./id";
export * from "./types";
export * from "./errors";
export * from "./registry";
export * from "./property_store";
export * from "./object";
export * from "./events";
export * from "./validation";
