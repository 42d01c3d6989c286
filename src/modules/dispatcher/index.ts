/**
 * dispatcher module: bounded-concurrency job scheduling with fail-fast.
 */

export { DispatcherImpl, createDispatcher } from './dispatcher.js'
export type { Dispatcher, DispatcherDeps, DispatchOptions } from './dispatcher.js'
