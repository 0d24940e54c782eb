import { EventEmitter } from 'eventemitter3';

/**
 * All typed events emitted by the fetch engine.
 * Keys are event names; values are the payload shape passed to listeners.
 */
export interface AppEvents {
  'cookies:extracted': {
    domain: string;
    browser: string;
    forced: boolean;
  };
  'cookies:cache-hit': {
    domain: string;
  };
  'auth:retry': {
    url: string;
    domain: string;
  };
  'samples:fetched': {
    url: string;
    platform: string;
    count: number;
  };
}

/**
 * Strongly-typed event emitter. All code should use this singleton
 * rather than creating ad-hoc emitters so that cross-module
 * communication stays in one place and is fully typed.
 */
class TypedEventEmitter extends EventEmitter<AppEvents> {}

export const eventBus = new TypedEventEmitter();
