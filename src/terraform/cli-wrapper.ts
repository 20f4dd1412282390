/**
 * Terraform CLI wrapper. Executes `terraform` via child_process in the
 * configured working directory and returns stdout/stderr as structured
 * results; a non-zero exit never throws.
 */

import { execFile as execFileCb } from "node:child_process";
import { promisify } from "node:util";

const execFile = promisify(execFileCb);

/** Options for Terraform CLI invocations. */
export interface TfCliOptions {
  /** Working directory containing .tf files. */
  cwd: string;
  /** Path to terraform binary (default: "terraform"). */
  terraformBin?: string;
  /** Timeout in ms (default: 300_000 = 5 min). */
  timeout?: number;
}

/** Result from a Terraform CLI command. */
export interface TfCliResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number | null;
  /** Parsed JSON output when requested. */
  json?: unknown;
}

function tfBin(opts: TfCliOptions): string {
  return opts.terraformBin ?? "terraform";
}

function stringField(err: object, key: "stdout" | "stderr"): string | undefined {
  const value: unknown = Reflect.get(err, key);
  return typeof value === "string" ? value : undefined;
}

function exitCodeOf(err: unknown): number {
  if (err && typeof err === "object") {
    const code: unknown = Reflect.get(err, "code");
    if (typeof code === "number") return code;
  }
  return 1;
}

async function run(args: string[], opts: TfCliOptions): Promise<TfCliResult> {
  const bin = tfBin(opts);
  const timeout = opts.timeout ?? 300_000;
  const env = { ...process.env, TF_IN_AUTOMATION: "1" };

  try {
    const { stdout, stderr } = await execFile(bin, args, {
      cwd: opts.cwd,
      env,
      timeout,
      maxBuffer: 50 * 1024 * 1024, // 50 MB
    });
    return { success: true, stdout, stderr, exitCode: 0 };
  } catch (err: unknown) {
    const stdout = err && typeof err === "object" ? stringField(err, "stdout") : undefined;
    const stderr = err && typeof err === "object" ? stringField(err, "stderr") : undefined;
    return {
      success: false,
      stdout: stdout ?? "",
      stderr: stderr || (err instanceof Error ? err.message : String(err)),
      exitCode: exitCodeOf(err),
    };
  }
}

function withJson(result: TfCliResult): TfCliResult {
  if (!result.stdout) return result;
  try {
    return { ...result, json: JSON.parse(result.stdout) };
  } catch {
    return result;
  }
}

// ─── Individual Commands ────────────────────────────────────────

/** `terraform init`: initialize providers and modules. */
export async function tfInit(opts: TfCliOptions): Promise<TfCliResult> {
  return run(["init", "-input=false", "-no-color"], opts);
}

/** `terraform plan`: generate an execution plan. */
export async function tfPlan(
  opts: TfCliOptions,
  flags?: { refreshOnly?: boolean; out?: string },
): Promise<TfCliResult> {
  const args = ["plan", "-input=false", "-no-color"];
  if (flags?.refreshOnly) args.push("-refresh-only");
  if (flags?.out) args.push(`-out=${flags.out}`);
  return run(args, opts);
}

/** `terraform apply -auto-approve`: apply changes. */
export async function tfApply(opts: TfCliOptions): Promise<TfCliResult> {
  return run(["apply", "-input=false", "-no-color", "-auto-approve"], opts);
}

/** `terraform destroy -auto-approve`: destroy managed resources. */
export async function tfDestroy(opts: TfCliOptions): Promise<TfCliResult> {
  return run(["destroy", "-input=false", "-no-color", "-auto-approve"], opts);
}

/** `terraform import`: import existing infrastructure. */
export async function tfImport(
  opts: TfCliOptions,
  address: string,
  id: string,
): Promise<TfCliResult> {
  return run(["import", "-no-color", "-input=false", address, id], opts);
}

/** `terraform state list`: list resources in state. */
export async function tfStateList(opts: TfCliOptions): Promise<TfCliResult> {
  return run(["state", "list"], opts);
}

/** `terraform output -json <name>`: read one output as JSON. */
export async function tfOutput(opts: TfCliOptions, name: string): Promise<TfCliResult> {
  return withJson(await run(["output", "-no-color", "-json", name], opts));
}
