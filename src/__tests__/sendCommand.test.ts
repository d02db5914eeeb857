/**
 * Tests for the send subcommand action (exit codes and error reporting)
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { executeSendCommand } from '../commands/send.js';
import { LogManager } from '../shared/ui/index.js';

function createMockLogger() {
  return { debug: vi.fn(), info: vi.fn(), error: vi.fn() };
}

describe('executeSendCommand', () => {
  let testDir: string;
  let configPath: string;
  let consoleSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    LogManager.resetInstance();
    testDir = mkdtempSync(join(tmpdir(), 'hipchat-notify-cmd-'));
    configPath = join(testDir, 'config.yaml');
    consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should return 0 when the API answers 204', async () => {
    // Given
    const mockFetch = vi.fn().mockResolvedValue(new Response(null, { status: 204 }));

    // When
    const exitCode = await executeSendCommand(
      { token: 'test-token', room: '42', message: 'hi' },
      { env: {}, configPath, fetch: mockFetch, logger: createMockLogger() },
    );

    // Then
    expect(exitCode).toBe(0);
    expect(mockFetch).toHaveBeenCalledOnce();
    expect(consoleSpy).not.toHaveBeenCalled();
  });

  it('should return 1 and print the reason when the token is missing', async () => {
    const mockFetch = vi.fn();

    const exitCode = await executeSendCommand(
      { room: '42', message: 'hi' },
      { env: {}, configPath, fetch: mockFetch, logger: createMockLogger() },
    );

    expect(exitCode).toBe(1);
    expect(mockFetch).not.toHaveBeenCalled();
    expect(consoleSpy).toHaveBeenCalledWith(
      expect.stringContaining('[ERROR] Required option --token (or HIPCHAT_TOKEN) not set'),
    );
  });

  it('should return 1 without a second report when the post fails', async () => {
    // Given
    const mockFetch = vi.fn().mockResolvedValue(
      new Response('{"error":{"code":401}}', { status: 401, statusText: 'Unauthorized' }),
    );
    const logger = createMockLogger();

    // When
    const exitCode = await executeSendCommand(
      { token: 'test-token', room: '42', message: 'hi' },
      { env: {}, configPath, fetch: mockFetch, logger },
    );

    // Then
    expect(exitCode).toBe(1);
    expect(logger.error).toHaveBeenCalledWith('POST failed: 401 Unauthorized\n{"error":{"code":401}}');
    expect(consoleSpy).not.toHaveBeenCalled();
  });

  it('should return 1 for insecure mode', async () => {
    const mockFetch = vi.fn();

    const exitCode = await executeSendCommand(
      { token: 'test-token', room: '42', message: 'hi', insecure: true },
      { env: {}, configPath, fetch: mockFetch, logger: createMockLogger() },
    );

    expect(exitCode).toBe(1);
    expect(mockFetch).not.toHaveBeenCalled();
    expect(consoleSpy).toHaveBeenCalledWith(
      expect.stringContaining('[ERROR] --insecure is not yet implemented'),
    );
  });

  it('should take token and room from the environment', async () => {
    const mockFetch = vi.fn().mockResolvedValue(new Response(null, { status: 204 }));

    const exitCode = await executeSendCommand(
      { message: 'hi' },
      {
        env: { HIPCHAT_TOKEN: 'test-token', HIPCHAT_ROOM_ID: '7' },
        configPath,
        fetch: mockFetch,
        logger: createMockLogger(),
      },
    );

    expect(exitCode).toBe(0);
    expect(mockFetch).toHaveBeenCalledWith(
      'https://api.hipchat.com/v2/room/7/notification',
      expect.objectContaining({ method: 'POST' }),
    );
  });

  it('should read settings from the config file', async () => {
    // Given
    writeFileSync(configPath, 'token: test-token\nroom: 9\nserver: chat.example.com\n', 'utf-8');
    const mockFetch = vi.fn().mockResolvedValue(new Response(null, { status: 204 }));

    // When
    const exitCode = await executeSendCommand(
      { message: 'hi' },
      { env: {}, configPath, fetch: mockFetch, logger: createMockLogger() },
    );

    // Then
    expect(exitCode).toBe(0);
    expect(mockFetch).toHaveBeenCalledWith(
      'https://chat.example.com/v2/room/9/notification',
      expect.objectContaining({
        headers: expect.objectContaining({ Authorization: 'Bearer test-token' }),
      }),
    );
  });

  it('should locate the config file through HIPCHAT_NOTIFY_CONFIG_DIR', async () => {
    writeFileSync(configPath, 'token: test-token\nroom: 5\n', 'utf-8');
    const mockFetch = vi.fn().mockResolvedValue(new Response(null, { status: 204 }));

    const exitCode = await executeSendCommand(
      { message: 'hi' },
      { env: { HIPCHAT_NOTIFY_CONFIG_DIR: testDir }, fetch: mockFetch, logger: createMockLogger() },
    );

    expect(exitCode).toBe(0);
    expect(mockFetch).toHaveBeenCalledWith(
      'https://api.hipchat.com/v2/room/5/notification',
      expect.anything(),
    );
  });
});
