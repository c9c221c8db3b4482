#!/usr/bin/env -S tsx

import fs from "node:fs/promises";
import { runCosmoConvert } from "../tools/cosmoConvert";

function parseArgs(): { inPath?: string; outPath?: string; to?: string; units?: string; pretty: boolean } {
  const args = process.argv.slice(2);
  let inPath: string | undefined;
  let outPath: string | undefined;
  let to: string | undefined;
  let units: string | undefined;
  let pretty = false;

  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (token === "--in" && args[i + 1]) {
      inPath = args[i + 1];
      i += 1;
    } else if (token === "--out" && args[i + 1]) {
      outPath = args[i + 1];
      i += 1;
    } else if (token === "--to" && args[i + 1]) {
      to = args[i + 1];
      i += 1;
    } else if (token === "--units" && args[i + 1]) {
      units = args[i + 1];
      i += 1;
    } else if (token === "--pretty") {
      pretty = true;
    }
  }

  return { inPath, outPath, to, units, pretty };
}

async function main() {
  const { inPath, outPath, to, units, pretty } = parseArgs();
  if (!inPath || (to !== "physical" && to !== "comoving")) {
    console.error("usage: cosmo-convert --in <array.json> --to physical|comoving [--units <unit>] [--out <file>] [--pretty]");
    process.exit(2);
  }

  const source = await fs.readFile(inPath, "utf8");
  const { json, summary } = runCosmoConvert(source, { to, units, pretty });

  if (outPath) {
    await fs.writeFile(outPath, `${json}\n`, "utf8");
    console.error(`[cosmo-convert] wrote ${summary.frame} array (${summary.units}) to ${outPath}`);
  } else {
    console.log(json);
  }
  if (summary.cosmoFactor) {
    console.error(`[cosmo-convert] ${summary.cosmoFactor} (z=${summary.redshift}, a-factor=${summary.aFactor})`);
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
