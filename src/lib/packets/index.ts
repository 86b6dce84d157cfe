export * from "./fields";
export * from "./errors";
export * from "./text";
export * from "./limits";
export * from "./header";
export * from "./motion";
export * from "./session";
export * from "./lapData";
export * from "./eventDetails";
export * from "./event";
export * from "./participants";
export * from "./carSetup";
export * from "./carTelemetry";
export * from "./carStatus";
export * from "./finalClassification";
export * from "./lobbyInfo";
export * from "./carDamage";
export * from "./sessionHistory";
export * from "./PacketRegistry";
