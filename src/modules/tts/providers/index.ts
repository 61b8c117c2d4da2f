export { CartesiaSynthesizer } from './cartesia.provider';
export { MockSynthesizer, buildSilentWav } from './mock.provider';
