/**
 * Corpus file discovery.
 */

import { stat } from "node:fs/promises";
import { join } from "node:path";
import { glob } from "glob";
import { SPEC_FILE_EXTENSIONS } from "../domain/rules.ts";

export interface CorpusFiles {
  corpus: string;
  files: string[];
}

export interface CollectedFiles {
  corpora: CorpusFiles[];
  missingCorpora: string[];
}

const SPEC_GLOB = `**/*.{${SPEC_FILE_EXTENSIONS.map((ext) => ext.slice(1)).join(",")}}`;

export async function collectCorpusFiles(rootDir: string, corpora: string[]): Promise<CollectedFiles> {
  const found: CorpusFiles[] = [];
  const missingCorpora: string[] = [];

  for (const corpus of corpora) {
    const corpusDir = join(rootDir, corpus);
    if (!(await exists(corpusDir))) {
      missingCorpora.push(corpus);
      continue;
    }

    const files = await glob(SPEC_GLOB, {
      cwd: corpusDir,
      absolute: true,
      nodir: true,
      dot: true,
      nocase: false,
    });
    files.sort();
    found.push({ corpus, files });
  }

  return { corpora: found, missingCorpora };
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}
