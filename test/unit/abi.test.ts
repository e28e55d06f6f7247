import fs from "fs";
import os from "os";
import path from "path";
import { Interface } from "ethers";
import { afterAll, describe, expect, it } from "vitest";
import { loadAbiFile, marketplaceAbi, TOKEN_ABI } from "../../oracle/abi";
import { ConfigError } from "../../oracle/errors";

const dir = fs.mkdtempSync(path.join(os.tmpdir(), "oracle-abi-"));
afterAll(() => fs.rmSync(dir, { recursive: true, force: true }));

function write(name: string, body: string): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, body);
  return file;
}

describe("built-in ABIs", () => {
  it.each(["bytes32", "uint256"] as const)("types the campaign id as %s", (idType) => {
    const iface = new Interface(marketplaceAbi(idType));
    expect(iface.getFunction("discardCampaign")?.inputs[0]?.type).toBe(idType);
    expect(iface.getFunction("getAllCampaigns")?.outputs[0]?.type).toBe(`${idType}[]`);
    expect(iface.getFunction("getCampaignInfo")?.outputs[0]?.components).toHaveLength(8);
  });

  it("declares only the token transfer", () => {
    const iface = new Interface(TOKEN_ABI);
    expect(iface.getFunction("transfer")?.format()).toBe("transfer(address,uint256)");
    expect(iface.fragments).toHaveLength(1);
  });
});

describe("loadAbiFile", () => {
  it("loads the abi field of a compiled artifact", () => {
    const file = write(
      "Token.json",
      JSON.stringify({
        contractName: "Token",
        abi: [
          {
            type: "function",
            name: "transfer",
            stateMutability: "nonpayable",
            inputs: [
              { name: "to", type: "address" },
              { name: "amount", type: "uint256" },
            ],
            outputs: [{ name: "", type: "bool" }],
          },
        ],
      }),
    );
    const iface = new Interface(loadAbiFile(file));
    expect(iface.getFunction("transfer")?.format()).toBe("transfer(address,uint256)");
  });

  it("fails on a missing file", () => {
    expect(() => loadAbiFile(path.join(dir, "missing.json"))).toThrow(ConfigError);
  });

  it("fails on an artifact without an abi", () => {
    expect(() => loadAbiFile(write("NoAbi.json", JSON.stringify({ bytecode: "0x" })))).toThrow(/has no "abi" array/);
  });

  it("fails on invalid JSON", () => {
    expect(() => loadAbiFile(write("Broken.json", "{"))).toThrow(/not valid JSON/);
  });
});
