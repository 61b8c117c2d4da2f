export { LruAudioCache } from './lru-audio-cache.service';
