import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { tfApply, tfDestroy, tfOutput, tfPlan, type TfCliOptions } from "./cli-wrapper.js";

// Stand-in binary: `output` prints JSON, anything else echoes its arguments.
const FAKE_TERRAFORM = `#!/bin/sh
case "$1" in
  output) echo '{"regions":17}' ;;
  *) echo "$*" ;;
esac
`;

describe("terraform CLI wrapper", () => {
  let dir: string;
  let cli: TfCliOptions;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "gd-tf-"));
    const terraformBin = join(dir, "terraform");
    await writeFile(terraformBin, FAKE_TERRAFORM, { mode: 0o755 });
    cli = { cwd: dir, terraformBin };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("plans into a plan file", async () => {
    const result = await tfPlan(cli, { out: "guardduty.tfplan" });
    expect(result.stdout).toBe("plan -input=false -no-color -out=guardduty.tfplan\n");
  });

  it("runs a refresh-only plan", async () => {
    const result = await tfPlan(cli, { refreshOnly: true });
    expect(result.stdout).toBe("plan -input=false -no-color -refresh-only\n");
  });

  it("applies and destroys without prompting", async () => {
    expect((await tfApply(cli)).stdout).toBe("apply -input=false -no-color -auto-approve\n");
    expect((await tfDestroy(cli)).stdout).toBe("destroy -input=false -no-color -auto-approve\n");
  });

  it("parses a JSON output", async () => {
    const result = await tfOutput(cli, "guardduty_summary");

    expect(result.success).toBe(true);
    expect(result.json).toEqual({ regions: 17 });
  });

  it("returns a failed run instead of throwing", async () => {
    const result = await tfOutput({ ...cli, terraformBin: join(dir, "missing") }, "guardduty_summary");

    expect(result.success).toBe(false);
    expect(result.json).toBeUndefined();
  });
});
