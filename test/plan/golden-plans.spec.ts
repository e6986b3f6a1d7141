/**
 * Golden plan tests: each `<name>.plan` file is built and explained, and the
 * text compared with `<name>.explain`; a `<name>.error` file instead holds
 * the expected `<kind>: <message>` of a failing build.
 *
 * A `; options: key=value ...` line in the plan file sets planner options.
 */

import { describe, it } from 'mocha';
import { expect } from 'chai';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { buildPlanFromText } from '../../src/parser/index.js';
import { explainPlan } from '../../src/core/explain.js';
import { PlannerOptionsManager } from '../../src/core/options.js';
import { PlanError } from '../../src/common/errors.js';

// ESM equivalent for __dirname
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

interface PlanTestCase {
	name: string;
	planFile: string;
	explainFile: string;
	errorFile: string;
}

function findTestCases(): PlanTestCase[] {
	return fs.readdirSync(__dirname)
		.filter(entry => entry.endsWith('.plan'))
		.sort()
		.map(entry => {
			const baseName = entry.slice(0, -'.plan'.length);
			return {
				name: baseName,
				planFile: path.join(__dirname, entry),
				explainFile: path.join(__dirname, baseName + '.explain'),
				errorFile: path.join(__dirname, baseName + '.error'),
			};
		});
}

function optionsFor(text: string): PlannerOptionsManager {
	const options = new PlannerOptionsManager();
	const match = /^;\s*options:(.*)$/m.exec(text);
	if (match) {
		for (const setting of match[1].trim().split(/\s+/)) {
			const [key, value] = setting.split('=');
			options.setOption(key, value);
		}
	}
	return options;
}

function readExpected(filePath: string): string | undefined {
	return fs.existsSync(filePath) ? fs.readFileSync(filePath, 'utf-8').trimEnd() : undefined;
}

describe('Golden Plan Tests', () => {
	const testCases = findTestCases();

	it('should have test cases', () => {
		expect(testCases).to.not.be.empty;
	});

	for (const testCase of testCases) {
		it(`should match golden plan for ${testCase.name}`, () => {
			const text = fs.readFileSync(testCase.planFile, 'utf-8');
			const options = optionsFor(text);
			const expectedExplain = readExpected(testCase.explainFile);
			const expectedError = readExpected(testCase.errorFile);

			if (expectedError !== undefined) {
				try {
					buildPlanFromText(text, options);
				} catch (error) {
					if (!(error instanceof PlanError)) throw error;
					expect(`${error.kind}: ${error.message}`).to.equal(expectedError);
					return;
				}
				expect.fail(`Expected ${testCase.name} to fail with ${expectedError}`);
			}

			if (expectedExplain === undefined) {
				throw new Error(`Missing golden file for ${testCase.name}: add ${path.basename(testCase.explainFile)} or ${path.basename(testCase.errorFile)}`);
			}
			const graph = buildPlanFromText(text, options);
			expect(explainPlan(graph, options)).to.equal(expectedExplain);
		});
	}
});
