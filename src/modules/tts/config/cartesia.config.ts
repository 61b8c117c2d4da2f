/**
 * Cartesia TTS Configuration
 * Only the API key and model come from the environment
 */

export interface CartesiaConfig {
  apiKey: string;
  model: string;
  outputFormat: {
    container: 'mp3';
    sampleRate: number;
    bitRate: number;
  };
}

export const cartesiaConfig: Readonly<CartesiaConfig> = Object.freeze({
  apiKey: process.env.CARTESIA_API_KEY || '',
  model: process.env.TTS_MODEL || 'sonic-2',

  // Whole clips are sent to the client as base64, so a compressed container
  outputFormat: Object.freeze({
    container: 'mp3' as const,
    sampleRate: 44100,
    bitRate: 128000,
  }),
});
