import fs from 'fs/promises';
import path from 'path';
import { pathToFileURL } from 'url';
import { ScriptModuleSchema, ScriptOutcomeSchema } from '../schemas/script.js';
import { errorMessage } from '../utils/errors.js';
import type { ScriptResult } from '../types/scanner.js';

export interface ScriptContext {
  host: string;
  port: number | undefined;
  log: (message: string) => void;
}

export interface ScriptRunner {
  run(scriptName: string, host: string, port?: number): Promise<ScriptResult>;
}

const SCRIPT_EXTENSIONS = ['.mjs', '.js'];

async function fileExists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

/**
 * Runs ES module scripts from a directory. A script's default export receives
 * the host (and port, for per-port runs) and may return `{ output, data }`.
 */
export class ModuleScriptRunner implements ScriptRunner {
  private readonly scriptsDir: string;

  constructor(scriptsDir = 'scripts') {
    this.scriptsDir = path.resolve(scriptsDir);
  }

  async findScript(scriptName: string): Promise<string | null> {
    for (const extension of SCRIPT_EXTENSIONS) {
      const candidate = path.join(this.scriptsDir, `${scriptName}${extension}`);
      if (await fileExists(candidate)) {
        return candidate;
      }
    }
    return null;
  }

  async run(scriptName: string, host: string, port?: number): Promise<ScriptResult> {
    const result: ScriptResult = {
      scriptName,
      host,
      port,
      success: false,
      output: '',
      data: {},
    };

    const scriptPath = await this.findScript(scriptName);
    if (!scriptPath) {
      result.error = `Script file not found: ${path.join(this.scriptsDir, `${scriptName}.mjs`)}`;
      return result;
    }

    const lines: string[] = [];
    const context: ScriptContext = { host, port, log: (message) => lines.push(message) };

    try {
      const module = ScriptModuleSchema.parse(await import(pathToFileURL(scriptPath).href));
      const outcome = ScriptOutcomeSchema.parse(await module.default(context));

      if (outcome?.output) lines.push(outcome.output);
      result.data = outcome?.data ?? {};
      result.success = true;
    } catch (error) {
      result.error = errorMessage(error);
    }

    result.output = lines.join('\n');
    return result;
  }
}
