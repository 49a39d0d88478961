import fs from "node:fs/promises";
import path from "node:path";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { afterEach, describe, expect, it } from "vitest";
import type { AppConfig } from "../src/config.js";
import { createServer } from "../src/server.js";
import { mkTempDir } from "./helpers.js";

const open: Client[] = [];

async function connect(cfg: AppConfig = { dryRun: true, concurrency: 2 }): Promise<Client> {
  const server = createServer(cfg);
  const client = new Client({ name: "namefold-test", version: "0.0.0" });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  open.push(client);
  return client;
}

afterEach(async () => {
  await Promise.all(open.splice(0).map((client) => client.close()));
});

describe("MCP tools", () => {
  it("lists both tools", async () => {
    const client = await connect();
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual(["clean_name", "clean_paths"]);
  });

  it("cleans a single name", async () => {
    const client = await connect();
    const result = await client.callTool({ name: "clean_name", arguments: { name: "café.txt" } });
    expect(result).toMatchObject({
      content: [{ type: "text", text: '{"name":"café.txt","cleaned":"cafe.txt","changed":true}' }]
    });
  });

  it("previews renames below a directory", async () => {
    const dir = await mkTempDir();
    await fs.writeFile(path.join(dir, "a b.txt"), "");
    const client = await connect();

    const result = await client.callTool({ name: "clean_paths", arguments: { paths: [dir], onlyErrors: true } });

    const report = JSON.stringify(
      [{ path: path.join(dir, "a b.txt"), modified: path.join(dir, "a_b.txt"), error: "dry-run" }],
      null,
      2
    );
    expect(result).toMatchObject({
      content: [
        { type: "text", text: "Checked 2 path(s): 0 renamed, 1 pending (dry-run), 0 failed." },
        { type: "text", text: report }
      ]
    });
    expect(await fs.readdir(dir)).toEqual(["a b.txt"]);
  });

  it("renames when the configured default is not a dry run", async () => {
    const dir = await mkTempDir();
    await fs.writeFile(path.join(dir, "a b.txt"), "");
    const client = await connect({ dryRun: false, concurrency: 1 });

    const result = await client.callTool({ name: "clean_paths", arguments: { paths: [dir], onlyErrors: true } });

    expect(result).toMatchObject({
      content: [
        { type: "text", text: "Checked 2 path(s): 1 renamed, 0 pending (dry-run), 0 failed." },
        { type: "text", text: "[]" }
      ]
    });
    expect(await fs.readdir(dir)).toEqual(["a_b.txt"]);
  });

  it("lets the call override the configured default", async () => {
    const dir = await mkTempDir();
    await fs.writeFile(path.join(dir, "a b.txt"), "");
    const client = await connect({ dryRun: false, concurrency: 1 });

    await client.callTool({ name: "clean_paths", arguments: { paths: [dir], dryRun: true } });

    expect(await fs.readdir(dir)).toEqual(["a b.txt"]);
  });
});
