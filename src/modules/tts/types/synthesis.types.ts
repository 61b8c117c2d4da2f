/**
 * Synthesis Types
 */

/**
 * Voice selection for one synthesis call. Without an explicit voice the
 * language's configured voice is used.
 */
export interface VoiceConfig {
  language: string;
  voice?: string;
}

/**
 * Fully resolved request handed to the external engine
 */
export interface SynthesisRequest {
  text: string;
  voiceId: string;
  language: string;
}

/**
 * External speech-synthesis capability: text in, encoded audio out
 */
export interface SpeechSynthesizer {
  readonly name: string;
  synthesize(request: SynthesisRequest): Promise<Buffer>;
}

export interface SynthesisMetrics {
  requests: number;
  cacheHits: number;
  cacheMisses: number;
  joinedFlights: number;
  engineCalls: number;
  failures: number;
  inFlight: number;
}
