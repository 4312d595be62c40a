import { ScriptSection } from '../entities/ScriptSection';

/**
 * IScriptSource - Port supplying the ordered sections of a script.
 * Implementations: JsonScriptSource
 */
export interface IScriptSource {
    loadSections(): Promise<ScriptSection[]>;
}
