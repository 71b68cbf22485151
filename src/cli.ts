#!/usr/bin/env node

import { existsSync, mkdtempSync, rmSync, statSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';

import { BuildCache } from './cache/buildCache.js';
import { createImportDiscoverer } from './discovery/importDiscoverer.js';
import { probePythonEnvironment } from './discovery/pythonEnv.js';
import { loadOptionalConfig, resolveSettings, type ExepackSettings } from './dx/config.js';
import { isDebugEnabled, setDebugEnabled } from './dx/logger.js';
import { errorMessage } from './dx/warnings.js';
import { createCommandEngine } from './packaging/commandEngine.js';
import { extractScriptPath, packageWithCache } from './packaging/packageWithCache.js';
import { humanBytes } from './utils/fsSize.js';

function getFlagValue(argv: string[], name: string): string | undefined {
	const idx = argv.indexOf(name);
	if (idx === -1) return undefined;
	return argv[idx + 1];
}

function hasFlag(argv: string[], name: string): boolean {
	return argv.includes(name);
}

function usage() {
	console.log(`exepack

Usage:
	exepack cache status
	exepack cache clear
	exepack discover <script.py> [--json] [--no-verify]
	exepack build [--out <dir>] -- <engine> <engine args...>
	exepack doctor

Examples:
	npx exepack discover app.py
	npx exepack build --out output -- pyinstaller --onefile app.py
	npx exepack cache status

Notes:
	- Settings come from exepack.config.js in the current directory (all optional)
	- Set EXEPACK_DEBUG=1 for debug logs, EXEPACK_TRACE=1 for JSON trace events
	- discover: --no-verify keeps names that can't be found in the python environment
`);
}

function fmtOk(msg: string) {
	return `✓ ${msg}`;
}

function fmtFail(msg: string) {
	return `✗ ${msg}`;
}

async function loadSettings(): Promise<ExepackSettings> {
	const settings = resolveSettings(await loadOptionalConfig(process.cwd()), process.cwd());
	if (settings.debug) setDebugEnabled(true);
	return settings;
}

async function cacheCommand(sub: string | undefined, settings: ExepackSettings): Promise<number> {
	if (!sub || !['status', 'clear'].includes(sub)) {
		console.error('Usage: exepack cache <status|clear>');
		return 1;
	}
	const cache = new BuildCache(settings.cache);

	if (sub === 'status') {
		const s = cache.stats();
		console.log(fmtOk(`Cache directory: ${s.cacheDirectory}`));
		console.log(fmtOk(`Cache entries: ${s.entryCount}`));
		console.log(fmtOk(`Disk usage: ${humanBytes(s.totalSizeMB * 1024 * 1024)} of ${s.maxSizeMB} MB`));
		console.log(fmtOk(`Retention: ${s.retentionDays} days`));
		if (!settings.cache.enabled) console.log(fmtFail('Cache is disabled in exepack.config.js'));
		return 0;
	}

	if (!cache.clear()) {
		console.error(fmtFail(`Could not clear ${cache.directory}`));
		return 1;
	}
	console.log(fmtOk('Cache cleared'));
	return 0;
}

async function discoverCommand(argv: string[], settings: ExepackSettings): Promise<number> {
	const script = argv[3];
	if (!script || script.startsWith('-')) {
		console.error('Usage: exepack discover <script.py> [--json] [--no-verify]');
		return 1;
	}
	if (!existsSync(script)) {
		console.error(`No such file: ${script}`);
		return 1;
	}

	const discoverer = createImportDiscoverer({
		settings: { ...settings.discovery, enabled: true },
		verify: !hasFlag(argv, '--no-verify'),
	});
	const report = discoverer.discoverWithReport(script);

	if (hasFlag(argv, '--json')) {
		console.log(JSON.stringify(report, null, 2));
		return 0;
	}
	console.log(`Scanned ${report.visited.length} file(s)`);
	if (!report.modules.length) {
		console.log('No hidden imports detected');
		return 0;
	}
	for (const m of report.modules) console.log(`  --hidden-import ${m}`);
	return 0;
}

async function buildCommand(argv: string[], settings: ExepackSettings): Promise<number> {
	const sep = argv.indexOf('--');
	const [command, ...args] = sep === -1 ? [] : argv.slice(sep + 1);
	if (!command) {
		console.error('Usage: exepack build [--out <dir>] -- <engine> <engine args...>');
		return 1;
	}

	const scriptPath = extractScriptPath(args);
	if (!scriptPath) {
		console.error('Could not find the entry script (a .py argument) in the engine arguments');
		return 1;
	}

	const own = argv.slice(0, sep);
	const outputDir = resolve(getFlagValue(own, '--out') ?? 'output');
	const workDir = mkdtempSync(join(tmpdir(), 'exepack-build-'));

	try {
		const result = await packageWithCache(
			{ scriptPath, args, distPath: join(workDir, 'application'), outputDir },
			{
				engine: createCommandEngine({ command, workDir }),
				cache: new BuildCache(settings.cache),
				discoverer: createImportDiscoverer({ settings: settings.discovery }),
			},
		);
		if (result.cached) console.log(fmtOk(`Reused cached build in ${result.outputDir}`));
		else console.log(fmtOk(`Built into ${result.outputDir}`));
		if (result.hiddenImports.length) {
			console.log(fmtOk(`Added hidden imports: ${result.hiddenImports.join(', ')}`));
		}
		return 0;
	} catch (e) {
		console.error(fmtFail(`Build failed: ${errorMessage(e)}`));
		return 1;
	} finally {
		rmSync(workDir, { recursive: true, force: true });
	}
}

async function doctorCommand(settings: ExepackSettings): Promise<number> {
	const lines: string[] = [];

	const env = probePythonEnvironment(settings.discovery.python);
	if (env) {
		lines.push(fmtOk(`Python ${env.version} (${env.executable}), ${env.searchPaths.length} search paths`));
	} else {
		lines.push(fmtFail(`Python not runnable as "${settings.discovery.python}" (hidden imports won't be verified)`));
	}

	// cache directory health
	const root = settings.cache.directory;
	try {
		const st = existsSync(root) ? statSync(root) : null;
		if (!st) lines.push(fmtOk(`Cache directory will be created at ${root}`));
		else if (st.isDirectory()) lines.push(fmtOk(`Cache directory OK (${root})`));
		else lines.push(fmtFail(`Cache path is not a directory: ${root}`));
	} catch (e) {
		lines.push(fmtFail(`Cache directory not accessible: ${errorMessage(e)}`));
	}

	try {
		await import('tree-sitter-python');
		lines.push(fmtOk('Python grammar loaded'));
	} catch (e) {
		lines.push(fmtFail(`Python grammar failed to load: ${errorMessage(e)}`));
	}

	console.log(lines.join('\n'));
	return lines.some((l) => l.startsWith('✗')) ? 1 : 0;
}

async function main(): Promise<number> {
	const argv = process.argv;
	const [, , cmd, arg] = argv;

	if (!cmd || cmd === '-h' || cmd === '--help') {
		usage();
		return 0;
	}

	const settings = await loadSettings();

	if (cmd === 'cache') return cacheCommand(arg, settings);
	if (cmd === 'discover') return discoverCommand(argv, settings);
	if (cmd === 'build') return buildCommand(argv, settings);
	if (cmd === 'doctor') return doctorCommand(settings);

	console.error(`Unknown command: ${cmd}`);
	usage();
	return 1;
}

main().then(
	(code) => process.exit(code),
	(err: unknown) => {
		// eslint-disable-next-line no-console
		console.error('[exepack]', isDebugEnabled() ? err : errorMessage(err));
		process.exit(1);
	},
);
