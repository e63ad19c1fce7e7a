/**
 * Test utilities index
 */

export * from "./fixtures/monitors";
export * from "./helpers";
export * from "./mocks/k8s";
export * from "./mocks/store";
