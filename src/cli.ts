#!/usr/bin/env node

import { mkdirSync, mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';

import type { ToolchainAdapter } from './compiler/adapter.js';
import { buildCompileCommand } from './compiler/buildCommand.js';
import { detectCsCompiler } from './compiler/detectCsCompiler.js';
import { ToolchainUnusableError } from './compiler/errors.js';
import { createToolchainAdapter } from './compiler/index.js';
import { spawnRunner } from './compiler/process.js';
import type { ToolchainConfig } from './dx/config.js';
import { loadOptionalConfig } from './dx/config.js';
import { traceError, traceInfo } from './dx/trace.js';
import { hasFlag, parseArgsCommand } from './cliArgs.js';

function usage() {
	console.log(`cs-toolchain

Usage:
	cs-toolchain doctor
	cs-toolchain args <source...> [--out <path>] [--target exe|winexe|library|module]
	                  [--buildtype <type>] [--optimization 0|g|1|2|3|s] [--debug] [--werror]
	                  [--ref <assembly>]... [--build-dir <dir>] [--json]

Examples:
	npx cs-toolchain doctor
	npx cs-toolchain args Program.cs --out app.exe --buildtype release
	npx cs-toolchain args Lib.cs --target library --ref Newtonsoft.Json.dll --json

Notes:
	- Compiler lookup order: config "compiler", $CSC, csc, mcs, dotnet
	- Optional project config: cs-toolchain.config.json
	- CS_TOOLCHAIN_DEBUG=1 enables debug logs, CS_TOOLCHAIN_TRACE=1 structured traces
`);
}

function fmtOk(msg: string) {
	return `✓ ${msg}`;
}

function fmtFail(msg: string) {
	return `✗ ${msg}`;
}

function errorMessage(e: unknown): string {
	return e instanceof Error ? e.message : String(e);
}

function adapterFromConfig(config: ToolchainConfig | null): ToolchainAdapter {
	const info = detectCsCompiler({
		candidates: config?.compiler
			? [config.compiler, process.env.CSC, 'csc', 'mcs', 'dotnet']
			: undefined,
	});
	return createToolchainAdapter(info, { sdkVersion: config?.sdkVersion });
}

function doctor(config: ToolchainConfig | null): number {
	const lines: string[] = [];
	let adapter: ToolchainAdapter | undefined;
	try {
		adapter = adapterFromConfig(config);
		lines.push(fmtOk(`C# compiler detected (${adapter.kind} ${adapter.version}: ${adapter.nameString()})`));
		if (adapter.runner) lines.push(fmtOk(`Runner: ${adapter.runner}`));
		if (adapter.sdk) {
			lines.push(fmtOk(`SDK ${adapter.sdk.version} (${adapter.sdk.frameworkMoniker}, runtime ${adapter.sdk.runtimeVersion})`));
		}
	} catch (e) {
		lines.push(fmtFail(`Compiler detection failed: ${errorMessage(e)}`));
	}

	if (adapter) {
		let workDir: string;
		if (config?.workDir) {
			workDir = resolve(config.workDir);
			mkdirSync(workDir, { recursive: true });
		} else {
			workDir = mkdtempSync(join(tmpdir(), 'cs-toolchain-'));
		}
		try {
			adapter.sanityCheck(workDir, spawnRunner);
			lines.push(fmtOk(adapter.executesSanityProgram ? 'Sanity check passed (compile + run)' : 'Sanity check passed (compile)'));
		} catch (e) {
			lines.push(fmtFail(`Sanity check failed: ${errorMessage(e)}`));
			if (e instanceof ToolchainUnusableError && e.stderr) {
				lines.push(e.stderr.trim());
			}
		}
		lines.push(fmtOk(`Response files use ${adapter.rspFileSyntax()} syntax`));
	}

	console.log(lines.join('\n'));
	return lines.some((l) => l.startsWith('✗')) ? 1 : 0;
}

async function main(): Promise<number> {
	const [, , cmd, ...rest] = process.argv;

	if (!cmd || cmd === '-h' || cmd === '--help' || cmd === 'help') {
		usage();
		return 0;
	}

	const config = await loadOptionalConfig();
	traceInfo('cli.start', { cmd });

	if (cmd === 'doctor') return doctor(config);

	if (cmd === 'args') {
		const request = parseArgsCommand(rest, config);
		if (typeof request === 'string') {
			console.error(request);
			usage();
			return 1;
		}
		const command = buildCompileCommand(adapterFromConfig(config), request);
		if (hasFlag(rest, '--json')) console.log(JSON.stringify(command, null, 2));
		else console.log(command.argv.join(' '));
		return 0;
	}

	console.error(`Unknown command: ${cmd}`);
	usage();
	return 1;
}

main().then(
	(code) => process.exit(code),
	(err: unknown) => {
		traceError('cli.failed', { error: errorMessage(err) });
		console.error(`[cs-toolchain] ${errorMessage(err)}`);
		process.exit(1);
	},
);
