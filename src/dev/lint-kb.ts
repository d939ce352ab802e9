/**
 * Knowledge-base linter.
 *
 * Validates every YAML file under kb/ (or the directories given on the
 * command line) and reports issues grouped by file.
 * It can be run with: npm run lint:kb
 */

import { dirname, join, relative } from 'node:path';
import { fileURLToPath } from 'node:url';

import { KnowledgeBaseError, type KnowledgeBaseIssue } from '../domain/errors.js';
import { findKnowledgeBaseFiles, loadKnowledgeBaseFiles } from '../io/kb-loader.js';

const here = dirname(fileURLToPath(import.meta.url));
const defaultDir = join(here, '../../kb');

function report(issues: readonly KnowledgeBaseIssue[]): void {
  const byFile = new Map<string, KnowledgeBaseIssue[]>();
  for (const issue of issues) {
    const file = issue.file ? relative(process.cwd(), issue.file) : '<merged>';
    const list = byFile.get(file) ?? [];
    list.push(issue);
    byFile.set(file, list);
  }

  for (const [file, fileIssues] of byFile) {
    console.log(`File: ${file}`);
    for (const issue of fileIssues) {
      console.log(`  Subject: ${issue.subject}`);
      console.log(`  Rule: ${issue.rule}`);
      console.log(`  Error: ${issue.message}`);
      console.log('');
    }
  }
  console.log(`Total: ${issues.length} issue(s) across ${byFile.size} file(s)\n`);
}

function main(): number {
  const dirs = process.argv.slice(2);
  const files = (dirs.length > 0 ? dirs : [defaultDir]).flatMap(findKnowledgeBaseFiles);
  console.log(`Linting ${files.length} knowledge-base file(s)...\n`);

  try {
    const kb = loadKnowledgeBaseFiles(files);
    console.log(
      `✓ ${kb.listSpaces().length} space(s), ${kb.listObjectTypes().length} object type(s), ` +
        `${kb.listActions().length} action(s) valid\n`
    );
    return 0;
  } catch (error) {
    if (error instanceof KnowledgeBaseError) {
      console.log('✗ Validation failures:\n');
      report(error.issues);
      return 1;
    }
    throw error;
  }
}

try {
  process.exit(main());
} catch (error) {
  console.error('Fatal error:', error);
  process.exit(1);
}
