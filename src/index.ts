/**
 * awrap - credential-resolving wrapper for the AWS CLI
 *
 * Main library exports
 */

// Export types
export * from './types/profile.js';
export * from './types/credentials.js';
export * from './types/cache.js';
export * from './types/settings.js';

// Export core functionality
export * from './core/errors.js';
export * from './core/config/index.js';
export * from './core/profile/index.js';
export * from './core/aws/index.js';
export * from './core/cache/index.js';
export * from './core/resolver/index.js';
export * from './core/launcher/index.js';
