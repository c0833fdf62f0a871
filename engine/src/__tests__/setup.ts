// ============================================
// Shared Test Setup
// Runs before each test file via vitest setupFiles
// ============================================

import { vi } from 'vitest';

// Mock the logger so tests never spin up pino transports
vi.mock('../logger', () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
  perfLogger: { info: vi.fn() },
  logWorldCreated: vi.fn(),
  logWorldLoaded: vi.fn(),
  logSnapshotRejected: vi.fn(),
  logFrameSkipped: vi.fn(),
}));
