/**
 * Mock implementations for testing.
 */

export { InMemoryLogStore, FakeServiceError, throttlingError } from './log-store.js';
