import { ResourceProvider } from "../core/provider"
import { LocalProvider } from "./local"
import { NullProvider } from "./null"

export * from './local'
export * from './null'

/**
 * Providers shipped with the engine.
 *
 * @param baseDir - directory relative local file names resolve against
 */
export function builtinProviders(baseDir: string = process.cwd()): ResourceProvider[] {
    return [new LocalProvider(baseDir), new NullProvider()]
}
