export type RequestFailureKind = "network" | "timeout" | "http" | "api";
