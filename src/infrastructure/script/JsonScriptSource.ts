import fs from 'fs';
import path from 'path';
import { ScriptSection } from '../../domain/entities/ScriptSection';
import { ScriptValidationError } from '../../domain/errors/CompositionErrors';
import { IScriptSource } from '../../domain/ports/IScriptSource';
import { parseScript } from './ScriptParser';

/**
 * Loads script sections from a JSON file written by the script generator.
 */
export class JsonScriptSource implements IScriptSource {
    constructor(private readonly scriptPath: string) { }

    async loadSections(): Promise<ScriptSection[]> {
        const absolutePath = path.isAbsolute(this.scriptPath)
            ? this.scriptPath
            : path.resolve(process.cwd(), this.scriptPath);

        const content = await fs.promises.readFile(absolutePath, 'utf-8');
        let data: unknown;
        try {
            data = JSON.parse(content);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new ScriptValidationError(`Script file ${absolutePath} is not valid JSON`, [reason]);
        }

        const sections = parseScript(data);
        console.log(`[Script] Loaded ${sections.length} sections from ${absolutePath}`);
        return sections;
    }
}
