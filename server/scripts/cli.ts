import "dotenv/config";
import fs from "node:fs";
import process from "node:process";

import { z } from "zod";

import { closeMongo, connectMongo } from "../src/config/db.js";
import { env } from "../src/config/env.js";
import { closeRedis } from "../src/config/redis.js";
import { buildInfrastructure, wireServices } from "../src/container.js";
import { ROLES } from "../src/domain/enums.js";
import { signAccessToken } from "../src/modules/auth/tokens.js";
import { CreateVehicleSchema } from "../src/modules/vehicles/schemas.js";
import { errorMessage } from "../src/utils/http.js";
import { newEntityId } from "../src/utils/ids.js";

const BASE = process.env.BASE_URL || `http://localhost:${env.PORT}`;
const DEFAULT_FIXTURE = new URL("./fixtures/vehicles.json", import.meta.url);

function arg(name: string, fallback?: string) {
  const idx = process.argv.indexOf(`--${name}`);
  if (idx >= 0 && process.argv[idx + 1]) return process.argv[idx + 1];
  return fallback;
}

async function withServices<T>(fn: (s: ReturnType<typeof wireServices>) => Promise<T>): Promise<T> {
  if (env.STORE_DRIVER === "mongo") await connectMongo();
  try {
    return await fn(wireServices(await buildInfrastructure()));
  } finally {
    await Promise.allSettled([closeMongo(), closeRedis()]);
  }
}

/** Dev-only: mint an access token the API will accept. */
async function cmdToken() {
  const role = z.enum(ROLES).parse(arg("role", "client"));
  const sub = arg("sub") ?? newEntityId();
  console.log(JSON.stringify({ sub, role, token: signAccessToken({ sub, role }) }, null, 2));
}

/** Loads vehicles from a JSON fixture through the inventory service (same normalization/duplicate rules as the API). */
async function cmdSeed() {
  const file = arg("file");
  const raw: unknown = JSON.parse(fs.readFileSync(file ?? DEFAULT_FIXTURE, "utf8"));
  const rows = z.array(z.unknown()).parse(raw);

  await withServices(async ({ inventory }) => {
    let created = 0;
    let skipped = 0;
    for (const row of rows) {
      const input = CreateVehicleSchema.parse(row);
      const res = await inventory.createVehicle(input);
      if (res.ok) {
        created += 1;
        console.log(`+ ${res.value.make} ${res.value.model} (${res.value.id})`);
      } else {
        skipped += 1;
        console.log(`- skipped ${input.make} ${input.model}: ${res.error.message}`);
      }
    }
    console.log(JSON.stringify({ ok: true, created, skipped }, null, 2));
  });
}

/** One pass of the availability sweep, outside the server. */
async function cmdSweep() {
  await withServices(async ({ coordinator }) => {
    const summary = await coordinator.sweepAvailability();
    console.log(JSON.stringify({ ok: true, ...summary }, null, 2));
  });
}

async function cmdHealth() {
  const resp = await fetch(`${BASE}/health/deps`);
  const body: unknown = await resp.json();
  console.log(JSON.stringify({ status: resp.status, body }, null, 2));
}

async function main() {
  const cmd = process.argv[2];
  try {
    switch (cmd) {
      case "token":
        await cmdToken();
        break;
      case "seed":
        await cmdSeed();
        break;
      case "sweep":
        await cmdSweep();
        break;
      case "health":
        await cmdHealth();
        break;
      default:
        console.log(
          `Usage:
  npm run cli -- token --role seller [--sub <USER_ID>]
  npm run cli -- seed [--file ./vehicles.json]
  npm run cli -- sweep
  npm run cli -- health
`
        );
    }
  } catch (e) {
    console.error(JSON.stringify({ ok: false, error: errorMessage(e) }, null, 2));
    process.exit(1);
  }
}

void main();
