import { config } from '../config.js';

// stdout carries protocol lines, so every log goes to stderr

export function debugLog(...args: unknown[]) {
  if (!config.debug) {
    return;
  }
  console.error('DEBUG:', new Date().toISOString(), ...args);
}

export function errorLog(...args: unknown[]) {
  console.error('ERROR:', new Date().toISOString(), ...args);
}
