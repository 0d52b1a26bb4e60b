/**
 * Test setup: fast-check globals, Effect equality testers and class matchers.
 */
import './matchers/classes.ts';
import { addEqualityTesters } from '@effect/vitest';
import fc from 'fast-check';
import { TEST_CONSTANTS } from './constants.ts';

// --- [ENTRY_POINT] -----------------------------------------------------------

fc.configureGlobal(TEST_CONSTANTS.fc);
addEqualityTesters();
