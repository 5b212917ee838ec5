/**
 * Custom error classes for categorized error handling.
 */

function createErrorClass(name: string) {
  return class extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
      super(message, options);
      this.name = name;
    }
  };
}

export const ConfigError = createErrorClass('ConfigError');
export const CliUsageError = createErrorClass('CliUsageError');
export const ContactSourceError = createErrorClass('ContactSourceError');
export const MessageDeliveryError = createErrorClass('MessageDeliveryError');
export const StatePersistenceError = createErrorClass('StatePersistenceError');
