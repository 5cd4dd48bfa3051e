import * as fs from 'fs/promises'
import * as path from 'path'
import { DeclarationError, ModuleSourceError } from "../errors/errors"
import { getLogger } from "../../log/utils"
import { ErrorUtils } from "../../tools/error-utils"
import { MODULE_FILE_NAME } from "../const"
import { ModuleDeclaration, parseModuleDeclaration } from "./parser"

/**
 * Loads module bodies from their source locator.
 */
export interface ModuleSourceLoader {
    /**
     * @param source - locator as written in the module call
     * @param fromDir - directory of the calling module, if any
     */
    load(source: string, fromDir: string | undefined): Promise<ModuleDeclaration>
}

export function isLocalSource(source: string): boolean {
    return source.startsWith('./') || source.startsWith('../') || source === '.' || source === '..'
}

/**
 * Loads modules from local directories holding a main.json file. Registry sources are not supported.
 */
export class LocalModuleLoader implements ModuleSourceLoader {

    private readonly logger = getLogger(LocalModuleLoader.name)

    async load(source: string, fromDir: string | undefined): Promise<ModuleDeclaration> {
        if (!isLocalSource(source)) {
            throw new ModuleSourceError(source, 'only local paths starting with ./ or ../ are supported')
        }
        const dir = path.resolve(fromDir ?? process.cwd(), source)
        return this.loadDirectory(dir, source)
    }

    /**
     * Load the module in `dir`. Also used for the root module.
     */
    async loadDirectory(dir: string, source: string = dir): Promise<ModuleDeclaration> {
        const file = path.join(dir, MODULE_FILE_NAME)
        this.logger.debug(`Loading module ${source} from ${file}`)

        let content: string
        try {
            content = await fs.readFile(file, 'utf-8')
        } catch (e) {
            throw new ModuleSourceError(source, `cannot read ${file}: ${ErrorUtils.extractErrorMessage(e)}`, ErrorUtils.toError(e))
        }

        let raw: unknown
        try {
            raw = JSON.parse(content)
        } catch (e) {
            throw new DeclarationError(file, `invalid JSON: ${ErrorUtils.extractErrorMessage(e)}`, ErrorUtils.toError(e))
        }

        return parseModuleDeclaration(raw, file, dir)
    }
}
