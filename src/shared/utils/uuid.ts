/**
 * UUID Utility
 * Centralized id generation using uuid v7 (time-ordered, sortable)
 */

import { v7 as uuidv7 } from 'uuid';

/**
 * Generate a UUID v7; used for connection and session ids
 */
export function generateId(): string {
  return uuidv7();
}

