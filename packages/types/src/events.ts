/**
 * @module events
 * Type-safe event bus definitions for cross-module communication.
 */

import type { Command } from './command';

/** Map of event names to their payload types. */
export interface EventMap {
  /** Fired before a command's execute() runs. */
  'command:executing': { command: Command };
  /** Fired after a command's execute() returned or threw. */
  'command:executed': { command: Command; success: boolean };
  /** Fired when a command is recorded (or merged into the previous entry). */
  'history:pushed': { description: string; merged: boolean };
  /** Fired when a command is undone. */
  'history:undone': { description: string };
  /** Fired when a command is redone. */
  'history:redone': { description: string };
  /** Fired when the history is dropped. */
  'history:cleared': undefined;
  /** Fired before a project file is written. */
  'project:saving': { path: string };
  /** Fired after a project file write finished or failed. */
  'project:saved': { path: string; success: boolean };
  /** Fired before a project file is read. */
  'project:loading': { path: string };
  /** Fired after a project file was read and rebuilt, or failed to. */
  'project:loaded': { path: string; success: boolean };
}

/** Callback function type for event listeners. */
export type EventCallback<K extends keyof EventMap> = EventMap[K] extends undefined
  ? () => void
  : (payload: EventMap[K]) => void;

/** Type-safe event bus for pub/sub communication. */
export interface EventBus {
  /** Subscribe to an event. Returns an unsubscribe function. */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Subscribe to an event for a single emission. */
  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Unsubscribe a specific callback from an event. */
  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void;
  /** Emit an event with an optional payload. */
  emit<K extends keyof EventMap>(
    event: K,
    ...args: EventMap[K] extends undefined ? [] : [EventMap[K]]
  ): void;
  /** Remove all listeners for all events. */
  clear(): void;
}
