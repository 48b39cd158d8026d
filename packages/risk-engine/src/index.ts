export * from "./circuitBreaker";
export * from "./riskGate";
