export * from "./checkins";
export * from "./monitors";
