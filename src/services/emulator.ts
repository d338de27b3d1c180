/**
 * Emulation capability and its RetroArch implementation.
 *
 * RetroArch is driven through two UDP interfaces:
 * - network commands on port 55355 (READ_CORE_MEMORY, WRITE_CORE_MEMORY,
 *   FRAMEADVANCE, SAVE_STATE, LOAD_STATE)
 * - the network gamepad on port 55400 (button bitmasks)
 *
 * Snapshots go through the configured state slot file: loading copies the
 * requested file into the slot then issues LOAD_STATE; saving issues
 * SAVE_STATE then copies the slot out.
 */

import { createSocket, type Socket } from "dgram";
import { lookup } from "dns/promises";
import { copyFile, mkdir, readFile, stat } from "fs/promises";
import { dirname } from "path";
import { loadEmulatorConfig, type EmulatorConfig } from "../config";
import { CapabilityError, errorMessage, type CapabilityOperation } from "../errors";
import type { Button, InputSequence } from "../types";
import { hex, logger } from "../utils/logger";

/**
 * The narrow surface the hunt needs from an emulator.
 */
export interface EmulationCapability {
  readBytes(address: number, length: number): Promise<Uint8Array>;
  writeBytes(address: number, bytes: Uint8Array): Promise<void>;
  advanceFrames(count: number): Promise<void>;
  sendInput(sequence: InputSequence): Promise<void>;
  loadSnapshot(path: string): Promise<void>;
  /** Write the current state to `path` and return its bytes */
  saveSnapshot(path: string): Promise<Uint8Array>;
}

// Button bitmask values for RetroArch network gamepad
export const BUTTON_BITMASKS: Record<Button, number> = {
  a: 1,
  b: 2,
  select: 4,
  start: 8,
  right: 16,
  left: 32,
  up: 64,
  down: 128,
  r: 256,
  l: 512,
};

export function buttonMask(buttons: readonly Button[]): number {
  return buttons.reduce((mask, button) => mask | BUTTON_BITMASKS[button], 0);
}

/**
 * Format a READ_CORE_MEMORY request.
 */
export function formatReadCommand(address: number, length: number): string {
  return `READ_CORE_MEMORY ${address.toString(16).toUpperCase().padStart(8, "0")} ${length}`;
}

export function formatWriteCommand(address: number, bytes: Uint8Array): string {
  const hexBytes = Array.from(bytes, (b) => b.toString(16).toUpperCase().padStart(2, "0"));
  return `WRITE_CORE_MEMORY ${address.toString(16).toUpperCase().padStart(8, "0")} ${hexBytes.join(" ")}`;
}

/**
 * Parse the response from READ_CORE_MEMORY.
 * Format: "READ_CORE_MEMORY ADDR XX XX XX ..."; "-1" in the byte position
 * marks an error. Returns null for anything else.
 */
export function parseMemoryResponse(response: string, expectedLength: number): Uint8Array | null {
  const parts = response.trim().split(/\s+/);

  if (parts[0] !== "READ_CORE_MEMORY" || parts.length < 3 || parts[2] === "-1") {
    return null;
  }

  const hexBytes = parts.slice(2);
  if (hexBytes.length !== expectedLength || !hexBytes.every((h) => /^[0-9a-fA-F]{1,2}$/.test(h))) {
    return null;
  }
  return new Uint8Array(hexBytes.map((h) => parseInt(h, 16)));
}

/**
 * Parse the reply to WRITE_CORE_MEMORY: "WRITE_CORE_MEMORY ADDR N" where N
 * is the byte count written, or -1 on failure.
 */
export function parseWriteResponse(response: string): number | null {
  const parts = response.trim().split(/\s+/);
  if (parts[0] !== "WRITE_CORE_MEMORY" || parts.length < 3) return null;
  const written = parseInt(parts[2] ?? "", 10);
  return Number.isNaN(written) || written < 0 ? null : written;
}

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

/**
 * RetroArch over UDP. One instance per emulator; the host is resolved once
 * and cached.
 */
export class RetroArchEmulator implements EmulationCapability {
  private hostAddress: string | null = null;

  constructor(private readonly config: EmulatorConfig = loadEmulatorConfig()) {}

  /**
   * Resolve the emulator hostname to an IPv4 address, once.
   */
  private async resolveHost(): Promise<string> {
    if (this.hostAddress) return this.hostAddress;

    const { host } = this.config;
    if (/^\d+\.\d+\.\d+\.\d+$/.test(host)) {
      this.hostAddress = host;
      return host;
    }

    try {
      const result = await lookup(host, { family: 4 });
      logger.info(`Resolved emulator hostname '${host}'`, { address: result.address });
      this.hostAddress = result.address;
    } catch (err) {
      logger.warn(`Failed to resolve emulator hostname '${host}', using it as given`, {
        error: errorMessage(err),
      });
      this.hostAddress = host;
    }
    return this.hostAddress;
  }

  /**
   * Send a command and wait for one datagram back; null on timeout.
   */
  private async request(message: string): Promise<string | null> {
    const host = await this.resolveHost();
    const { memoryPort, timeoutMs } = this.config;

    return new Promise((resolve) => {
      const socket: Socket = createSocket("udp4");
      let settled = false;

      const finish = (value: string | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        socket.close();
        resolve(value);
      };

      const timeout = setTimeout(() => finish(null), timeoutMs);

      socket.on("message", (data) => finish(data.toString()));
      socket.on("error", (err) => {
        logger.debug("UDP socket error", { error: err.message });
        finish(null);
      });
      socket.send(message, memoryPort, host, (err) => {
        if (err) {
          logger.debug("UDP send error", { error: err.message });
          finish(null);
        }
      });
    });
  }

  /**
   * Fire-and-forget datagram.
   */
  private async send(port: number, message: string, operation: CapabilityOperation): Promise<void> {
    const host = await this.resolveHost();

    await new Promise<void>((resolve, reject) => {
      const socket: Socket = createSocket("udp4");
      socket.send(message, port, host, (err) => {
        socket.close();
        if (err) reject(new CapabilityError(operation, err.message, { cause: err }));
        else resolve();
      });
    });
  }

  /**
   * Retry a request/response exchange until `parse` accepts the reply.
   */
  private async exchange<T>(
    operation: CapabilityOperation,
    message: string,
    parse: (response: string) => T | null,
  ): Promise<T> {
    const { retries } = this.config;

    for (let attempt = 0; attempt < retries; attempt++) {
      const response = await this.request(message);
      if (response) {
        const parsed = parse(response);
        if (parsed !== null) return parsed;
        logger.debug("Unexpected emulator reply", { operation, response: response.slice(0, 80) });
      }
      if (attempt < retries - 1) await sleep(100);
    }

    throw new CapabilityError(operation, `no valid reply after ${retries} attempt(s)`);
  }

  async readBytes(address: number, length: number): Promise<Uint8Array> {
    return this.exchange("readBytes", formatReadCommand(address, length), (r) => parseMemoryResponse(r, length));
  }

  async writeBytes(address: number, bytes: Uint8Array): Promise<void> {
    const written = await this.exchange("writeBytes", formatWriteCommand(address, bytes), parseWriteResponse);
    if (written !== bytes.length) {
      throw new CapabilityError("writeBytes", `wrote ${written} of ${bytes.length} bytes at ${hex(address)}`);
    }
  }

  /**
   * FRAMEADVANCE steps one frame while paused; it has no reply.
   */
  async advanceFrames(count: number): Promise<void> {
    for (let i = 0; i < count; i++) {
      await this.send(this.config.memoryPort, "FRAMEADVANCE", "advanceFrames");
    }
  }

  async sendInput(sequence: InputSequence): Promise<void> {
    for (const step of sequence) {
      await this.send(this.config.inputPort, String(buttonMask(step.buttons)), "sendInput");
      await this.advanceFrames(step.holdFrames);
      await this.send(this.config.inputPort, "0", "sendInput");
      await this.advanceFrames(step.releaseFrames);
    }
  }

  async loadSnapshot(path: string): Promise<void> {
    try {
      await mkdir(dirname(this.config.statePath), { recursive: true });
      await copyFile(path, this.config.statePath);
    } catch (err) {
      throw new CapabilityError("loadSnapshot", `cannot stage ${path}: ${errorMessage(err)}`, { cause: err });
    }
    await this.send(this.config.memoryPort, "LOAD_STATE", "loadSnapshot");
    // Give the core a moment to swap state before the next command
    await this.advanceFrames(2);
  }

  async saveSnapshot(path: string): Promise<Uint8Array> {
    const before = await modifiedAt(this.config.statePath);
    await this.send(this.config.memoryPort, "SAVE_STATE", "saveSnapshot");

    // SAVE_STATE has no reply; wait for the slot file to change
    for (let attempt = 0; attempt < this.config.retries * 10; attempt++) {
      await this.advanceFrames(1);
      const after = await modifiedAt(this.config.statePath);
      if (after !== null && after !== before) {
        try {
          await mkdir(dirname(path), { recursive: true });
          await copyFile(this.config.statePath, path);
          return new Uint8Array(await readFile(path));
        } catch (err) {
          throw new CapabilityError("saveSnapshot", `cannot copy state to ${path}: ${errorMessage(err)}`, {
            cause: err,
          });
        }
      }
      await sleep(50);
    }

    throw new CapabilityError("saveSnapshot", `state slot ${this.config.statePath} was not written`);
  }
}

async function modifiedAt(path: string): Promise<number | null> {
  try {
    return (await stat(path)).mtimeMs;
  } catch {
    return null;
  }
}
