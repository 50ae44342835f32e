import { expect } from 'chai';
import * as sinon from 'sinon';
import { DEFAULT_ENGINE_CONFIG } from '#config/engineConfig';
import { InMemoryLineStore } from '#files/lineStore';
import type { Hunk } from '#shared/patch/patch.model';
import { setupConditionalLoggerOutput } from '#test/testUtils';
import { type PatchCommandDeps, USAGE, formatHunk, runPatchCommand } from './patchCommand';

const MARKUP = '------- SEARCH\nb\n=======\nB\n+++++++ REPLACE\n';
const UNIFIED = '--- a/a.txt\n+++ b/a.txt\n@@ -1,3 +1,3 @@\n a\n-b\n+B\n c\n';

describe('runPatchCommand', () => {
	setupConditionalLoggerOutput();

	let store: InMemoryLineStore;
	let printed: string[];
	let deps: PatchCommandDeps;

	beforeEach(() => {
		store = new InMemoryLineStore({ 'a.txt': ['a', 'b', 'c'] });
		printed = [];
		deps = {
			store,
			config: DEFAULT_ENGINE_CONFIG,
			readText: (path) => {
				if (path === 'edits.md') return MARKUP;
				if (path === 'edits.diff') return UNIFIED;
				throw new Error(`ENOENT: ${path}`);
			},
			requestConfirmation: sinon.stub<[string], Promise<boolean>>().resolves(true),
			print: (text) => printed.push(text),
		};
	});

	it('applies markup after confirmation', async () => {
		expect(await runPatchCommand(['a.txt', 'edits.md'], deps)).to.equal(0);
		expect(store.snapshot('a.txt')).to.deep.equal(['a', 'B', 'c']);
		expect(printed).to.deep.equal(['Patched a.txt']);
	});

	it('applies a unified diff', async () => {
		expect(await runPatchCommand(['a.txt', 'edits.diff', '--yes'], deps)).to.equal(0);
		expect(store.snapshot('a.txt')).to.deep.equal(['a', 'B', 'c']);
	});

	it('skips confirmation with --yes', async () => {
		const confirm = sinon.stub<[string], Promise<boolean>>().resolves(false);
		expect(await runPatchCommand(['--yes', 'a.txt', 'edits.md'], { ...deps, requestConfirmation: confirm })).to.equal(0);
		expect(confirm.called).to.be.false;
	});

	it('exits with 1 when the user declines', async () => {
		deps.requestConfirmation = sinon.stub<[string], Promise<boolean>>().resolves(false);
		expect(await runPatchCommand(['a.txt', 'edits.md'], deps)).to.equal(1);
		expect(printed).to.deep.equal(['User declined']);
		expect(store.snapshot('a.txt')).to.deep.equal(['a', 'b', 'c']);
	});

	it('prints the planned hunks on --dry-run without writing', async () => {
		expect(await runPatchCommand(['a.txt', 'edits.md', '--dry-run'], deps)).to.equal(0);
		expect(printed).to.deep.equal(['@@ -2,1 +2,1 @@\n-b\n+B']);
		expect(store.snapshot('a.txt')).to.deep.equal(['a', 'b', 'c']);
	});

	it('prints usage and exits with 2 on missing arguments', async () => {
		expect(await runPatchCommand(['a.txt'], deps)).to.equal(2);
		expect(printed).to.deep.equal([`Expected 2 arguments, got 1\n${USAGE}`]);
	});

	it('prints usage on --help', async () => {
		expect(await runPatchCommand(['--help'], deps)).to.equal(0);
		expect(printed).to.deep.equal([USAGE]);
	});

	it('reports an unreadable markup file', async () => {
		expect(await runPatchCommand(['a.txt', 'missing.md'], deps)).to.equal(1);
		expect(printed).to.deep.equal(['Cannot read missing.md: ENOENT: missing.md']);
	});
});

describe('formatHunk', () => {
	it('renders a pure insertion with no removed lines', () => {
		const hunk: Hunk = { oldLines: [], newLines: ['n'], startLine: 3, endLine: 2, newStartLine: 4, newEndLine: 4 };
		expect(formatHunk(hunk)).to.equal('@@ -3,0 +4,1 @@\n+n');
	});
});
