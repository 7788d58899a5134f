export * from './types/analysis.js';
export * from './types/triage.js';
export * from './types/chat.js';
export * from './types/voice.js';
export * from './utils/ModelOutput.js';
export * from './clients/GeminiClient.js';
export * from './clients/TwilioClient.js';
export * from './stores/CallResultStore.js';
