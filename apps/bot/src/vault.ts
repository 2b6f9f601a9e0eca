import fs from "node:fs";
import path from "node:path";
import { Keypair } from "@solana/web3.js";
import { hexToBytes, isHex, toHex } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import { z } from "zod";
import {
  chainFamily,
  EngineError,
  InvalidStateError,
  NotFoundError,
  type ChainFamily,
  type ChainId,
  type KeyVault,
} from "@tradeguard/core";

// Solana keys use the solana-keygen JSON array; EVM keys are a hex string.
const solanaKeySchema = z.array(z.number().int().min(0).max(255)).length(64);
const evmKeySchema = z.object({ privateKey: z.string().regex(/^0x[0-9a-fA-F]{64}$/) });

function ownerOf(family: ChainFamily, key: Uint8Array): string {
  if (family === "evm") {
    return privateKeyToAccount(toHex(key)).address.toLowerCase();
  }
  return Keypair.fromSecretKey(key).publicKey.toBase58();
}

function decodeKeyFile(family: ChainFamily, payload: unknown): Uint8Array {
  if (family === "solana") {
    return Uint8Array.from(solanaKeySchema.parse(payload));
  }
  const { privateKey } = evmKeySchema.parse(payload);
  if (!isHex(privateKey)) {
    throw new Error("Private key is not hex");
  }
  return hexToBytes(privateKey);
}

/**
 * Reads one key file per owner from `<keyDir>/<family>/<owner>.json` on each
 * use. The bytes exist only while `use` runs and are zeroed afterwards.
 */
export class FileKeyVault implements KeyVault {
  private readonly keyDir: string | undefined;

  public constructor(keyDir: string | undefined) {
    this.keyDir = keyDir;
  }

  public keyPath(chain: ChainId, owner: string): string {
    if (!this.keyDir) {
      throw new InvalidStateError("No key directory configured");
    }
    const family = chainFamily(chain);
    const fileName = family === "evm" ? owner.toLowerCase() : owner;
    if (!/^[A-Za-z0-9]+$/.test(fileName)) {
      throw new EngineError("INVALID_REQUEST", `Invalid owner address: ${owner}`);
    }
    return path.join(this.keyDir, family, `${fileName}.json`);
  }

  public async withKey<T>(chain: ChainId, owner: string, use: (key: Uint8Array) => Promise<T>): Promise<T> {
    const family = chainFamily(chain);
    const keyPath = this.keyPath(chain, owner);
    if (!fs.existsSync(keyPath)) {
      throw new NotFoundError("Key for", owner);
    }

    const key = decodeKeyFile(family, JSON.parse(fs.readFileSync(keyPath, "utf8")));
    try {
      const expected = family === "evm" ? owner.toLowerCase() : owner;
      if (ownerOf(family, key) !== expected) {
        throw new EngineError("INVALID_REQUEST", `Key file does not belong to ${owner}`);
      }
      return await use(key);
    } finally {
      key.fill(0);
    }
  }
}
