export * from "./lifestyle-types";
export * from "./dto";
