/**
 * Bedrock Invocation Logs
 *
 * Reads Amazon Bedrock model invocation logs from CloudWatch Logs and normalizes
 * Converse and ConverseStream invocations into immutable records.
 *
 * @module bedrock-invocation-logs
 */

// ============================================================================
// Pipeline
// ============================================================================

export * from './pipeline/index.js';

// ============================================================================
// Configuration
// ============================================================================

export * from './config/index.js';

// ============================================================================
// Error Handling
// ============================================================================

export * from './error/index.js';

// ============================================================================
// Types
// ============================================================================

export * from './types/index.js';

// ============================================================================
// Parsing and Reassembly
// ============================================================================

export * from './parser/index.js';
export * from './reassembly/index.js';
export * from './record/index.js';

// ============================================================================
// Fetching
// ============================================================================

export * from './fetcher/index.js';
export * from './store/index.js';

// ============================================================================
// Resilience
// ============================================================================

export * from './resilience/index.js';

// ============================================================================
// Observability
// ============================================================================

export * from './observability/index.js';

// ============================================================================
// Views
// ============================================================================

export * from './views/index.js';
