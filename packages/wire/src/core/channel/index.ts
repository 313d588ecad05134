export * from "./serial-queue"
export * from "./wire-channel"
