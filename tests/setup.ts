// Jest setup file
import { config } from 'dotenv';

// Load test-only environment variables, if any
config({ path: '.env.test' });

// Set test environment variables
process.env.NODE_ENV = 'test';

// Global test timeout
jest.setTimeout(30000);
