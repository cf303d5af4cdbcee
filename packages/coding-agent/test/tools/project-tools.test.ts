import { execFileSync } from "node:child_process";
import * as fs from "node:fs";
import * as path from "node:path";
import { Settings } from "@finch/coding-agent/config/settings";
import type { ToolSession } from "@finch/coding-agent/tools";
import { CreateVenvTool, findVenvPip, InstallDepsTool } from "@finch/coding-agent/tools/python-env";
import { parseNameStatus, SmartCommitTool, summarizeChanges } from "@finch/coding-agent/tools/smart-commit";
import { ToolError } from "@finch/coding-agent/tools/tool-errors";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createTempDir, createTestToolSession, removeTempDir } from "../utilities";

let dir: string;
let session: ToolSession;

beforeEach(() => {
	dir = fs.realpathSync(createTempDir());
	session = createTestToolSession(dir);
});

afterEach(() => {
	session.shells.dispose();
	removeTempDir(dir);
});

function writeScript(file: string, body: string): string {
	fs.mkdirSync(path.dirname(file), { recursive: true });
	fs.writeFileSync(file, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
	return file;
}

describe("create_venv", () => {
	it("creates .venv with the configured interpreter", async () => {
		const python = writeScript(path.join(dir, "bin", "fake-python"), 'mkdir -p "$3"');
		const tool = new CreateVenvTool({
			...session,
			settings: Settings.isolated({ "tools.python": python, "tools.commandTimeoutSeconds": 10 }),
		});

		const result = await tool.execute("call-1", {});

		expect(result.content[0]?.text).toBe("Created virtual environment: .venv");
		expect(result.details).toEqual({ venvPath: path.join(dir, ".venv"), created: true });
		expect(fs.statSync(path.join(dir, ".venv")).isDirectory()).toBe(true);
	});

	it("leaves an existing environment alone", async () => {
		fs.mkdirSync(path.join(dir, "app", ".venv"), { recursive: true });

		const result = await new CreateVenvTool(session).execute("call-1", { path: "app" });

		expect(result.content[0]?.text).toBe(`Virtual environment already exists: ${path.join("app", ".venv")}`);
		expect(result.details?.created).toBe(false);
	});

	it("reports a missing project or interpreter", async () => {
		await expect(new CreateVenvTool(session).execute("call-1", { path: "nope" })).rejects.toThrow(
			"Project directory not found: nope",
		);
		const tool = new CreateVenvTool({
			...session,
			settings: Settings.isolated({ "tools.python": "finch-missing-python" }),
		});
		await expect(tool.execute("call-1", {})).rejects.toThrow("Python interpreter not found: finch-missing-python");
	});
});

describe("install_deps", () => {
	it("needs confirmation and names the target environment", () => {
		const tool = new InstallDepsTool(session);
		expect(tool.dangerous).toBe(true);
		expect(tool.describeCall({ path: "app" })).toBe(`pip install into ${path.join("app", ".venv")}`);
	});

	it("installs requirements.txt with the environment's pip", async () => {
		writeScript(path.join(dir, ".venv", "bin", "pip"), 'echo "pip $*"');
		fs.writeFileSync(path.join(dir, "requirements.txt"), "requests\n");

		const result = await new InstallDepsTool(session).execute("call-1", {});

		expect(result.content[0]?.text).toBe("pip install -r requirements.txt");
		expect(result.details).toEqual({ source: "requirements.txt", exitCode: 0 });
	});

	it("installs a pyproject.toml project in editable mode", async () => {
		writeScript(path.join(dir, ".venv", "bin", "pip"), 'echo "pip $*"');
		fs.writeFileSync(path.join(dir, "pyproject.toml"), '[project]\nname = "demo"\n');

		const result = await new InstallDepsTool(session).execute("call-1", {});

		expect(result.content[0]?.text).toBe("pip install -e .");
		expect(result.details?.source).toBe("pyproject.toml");
	});

	it("fails with pip's output", async () => {
		writeScript(path.join(dir, ".venv", "bin", "pip"), "echo 'no matching distribution' >&2; exit 1");
		fs.writeFileSync(path.join(dir, "requirements.txt"), "nothing-here\n");

		const attempt = new InstallDepsTool(session).execute("call-1", {});
		await expect(attempt).rejects.toBeInstanceOf(ToolError);
		await expect(attempt).rejects.toThrow("[stderr]\nno matching distribution\n\npip install exited with code 1");
	});

	it("refuses without a manifest or an environment", async () => {
		const tool = new InstallDepsTool(session);
		await expect(tool.execute("call-1", {})).rejects.toThrow("No requirements.txt or pyproject.toml found");

		fs.writeFileSync(path.join(dir, "requirements.txt"), "requests\n");
		await expect(tool.execute("call-1", {})).rejects.toThrow(
			"No virtual environment at .venv; call create_venv first",
		);
	});

	it("finds pip in either layout", () => {
		const venv = path.join(dir, ".venv");
		expect(findVenvPip(venv)).toBeUndefined();
		writeScript(path.join(venv, "Scripts", "pip.exe"), "exit 0");
		expect(findVenvPip(venv)).toBe(path.join(venv, "Scripts", "pip.exe"));
	});
});

describe("summarizeChanges", () => {
	it("counts each kind and lists a few files", () => {
		const changes = parseNameStatus("M\ta.txt\nD\tb.txt\nA\tc.txt\nR100\told.txt\td.txt\n");
		expect(changes).toEqual([
			{ status: "M", path: "a.txt" },
			{ status: "D", path: "b.txt" },
			{ status: "A", path: "c.txt" },
			{ status: "R", path: "d.txt" },
		]);
		expect(summarizeChanges(changes)).toBe(
			"Add 1 file(s), Update 2 file(s), Remove 1 file(s)\n\n- a.txt\n- b.txt\n- c.txt\n- d.txt",
		);
	});

	it("leaves out the file list for larger commits", () => {
		const changes = ["a", "b", "c", "d", "e", "f"].map(name => ({ status: "A", path: name }));
		expect(summarizeChanges(changes)).toBe("Add 6 file(s)");
	});
});

describe("smart_commit", () => {
	const git = (...args: string[]) => execFileSync("git", args, { cwd: dir, encoding: "utf8" });

	beforeEach(() => {
		git("init", "-q");
		git("config", "user.email", "test@example.com");
		git("config", "user.name", "Test");
		git("config", "commit.gpgsign", "false");
	});

	it("needs confirmation and shows both git steps", () => {
		const tool = new SmartCommitTool(session);
		expect(tool.dangerous).toBe(true);
		expect(tool.describeCall({})).toBe("git add -A\ngit commit (message generated from the staged changes)");
		expect(tool.describeCall({ files: ["a.txt"], message: "fix a" })).toBe('git add -- a.txt\ngit commit -m "fix a"');
	});

	it("commits every change with a generated message", async () => {
		fs.writeFileSync(path.join(dir, "a.txt"), "a\n");
		fs.writeFileSync(path.join(dir, "b.txt"), "b\n");

		const result = await new SmartCommitTool(session).execute("call-1", {});

		expect(result.details).toEqual({ message: "Add 2 file(s)\n\n- a.txt\n- b.txt", files: 2 });
		expect(git("log", "-1", "--format=%s")).toBe("Add 2 file(s)\n");
		expect(git("status", "--porcelain")).toBe("");

		fs.writeFileSync(path.join(dir, "a.txt"), "a2\n");
		fs.rmSync(path.join(dir, "b.txt"));
		fs.writeFileSync(path.join(dir, "c.txt"), "c\n");
		const second = await new SmartCommitTool(session).execute("call-2", {});

		expect(second.details?.message).toBe(
			"Add 1 file(s), Update 1 file(s), Remove 1 file(s)\n\n- a.txt\n- b.txt\n- c.txt",
		);
	});

	it("stages only the named files and keeps a given message", async () => {
		fs.writeFileSync(path.join(dir, "a.txt"), "a\n");
		fs.writeFileSync(path.join(dir, "b.txt"), "b\n");

		const result = await new SmartCommitTool(session).execute("call-1", { files: ["a.txt"], message: "Add a" });

		expect(result.details).toEqual({ message: "Add a", files: 1 });
		expect(git("log", "-1", "--format=%s")).toBe("Add a\n");
		expect(git("status", "--porcelain")).toBe("?? b.txt\n");
	});

	it("refuses a clean tree", async () => {
		await expect(new SmartCommitTool(session).execute("call-1", {})).rejects.toThrow("No changes to commit");
	});
});
