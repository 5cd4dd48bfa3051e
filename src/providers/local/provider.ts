import * as fs from 'fs/promises'
import * as path from 'path'
import { createHash } from 'crypto'
import { z } from "zod"
import { getLogger } from "../../log/utils"
import { ErrorUtils } from "../../tools/error-utils"
import { AttributeMap } from "../../core/graph/expression"
import { ProviderResult, ResourceProvider } from "../../core/provider"

export const LOCAL_PROVIDER_NAME = "local"
export const LOCAL_FILE_KIND = "local_file"

export const LocalFileAttributesSchema = z.object({
    filename: z.string().min(1).describe("File path, relative to the working directory"),
    content: z.string(),
    file_permission: z.string().regex(/^0?[0-7]{3}$/, "must be an octal mode such as 0644").default("0644"),
}).strict()

/**
 * Files on the local machine. The file's absolute path is its identifier.
 */
export class LocalProvider implements ResourceProvider {

    readonly name = LOCAL_PROVIDER_NAME

    private readonly logger = getLogger(LocalProvider.name)

    constructor(private readonly baseDir: string = process.cwd()) {}

    async create(kind: string, attributes: AttributeMap): Promise<ProviderResult> {
        const file = this.parse(kind, attributes)
        const id = path.resolve(this.baseDir, file.filename)
        return this.write(id, attributes, file.content, file.file_permission)
    }

    async read(kind: string, id: string): Promise<AttributeMap | undefined> {
        this.checkKind(kind)
        let content: string
        try {
            content = await fs.readFile(id, 'utf-8')
        } catch (e) {
            if (ErrorUtils.errorCode(e) === 'ENOENT') {
                return undefined
            }
            throw e
        }
        return { id, content, content_sha1: sha1(content) }
    }

    async update(kind: string, id: string, attributes: AttributeMap): Promise<ProviderResult> {
        const file = this.parse(kind, attributes)
        return this.write(id, attributes, file.content, file.file_permission)
    }

    async destroy(kind: string, id: string): Promise<void> {
        this.checkKind(kind)
        this.logger.debug(`Removing ${id}`)
        await fs.rm(id, { force: true })
    }

    requiresReplacement(kind: string, attribute: string): boolean {
        return attribute === 'filename'
    }

    private async write(id: string, attributes: AttributeMap, content: string, permission: string): Promise<ProviderResult> {
        this.logger.debug(`Writing ${content.length} character(s) to ${id}`)
        await fs.mkdir(path.dirname(id), { recursive: true })
        await fs.writeFile(id, content, { encoding: 'utf-8', mode: parseInt(permission, 8) })
        await fs.chmod(id, parseInt(permission, 8))
        return { id, attributes: { ...attributes, id, content_sha1: sha1(content) } }
    }

    private parse(kind: string, attributes: AttributeMap): z.infer<typeof LocalFileAttributesSchema> {
        this.checkKind(kind)
        const result = LocalFileAttributesSchema.safeParse(attributes)
        if (!result.success) {
            throw new Error(`Invalid ${kind} attributes: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`)
        }
        return result.data
    }

    private checkKind(kind: string): void {
        if (kind !== LOCAL_FILE_KIND) {
            throw new Error(`Resource kind ${kind} is not supported by provider ${this.name}`)
        }
    }
}

function sha1(content: string): string {
    return createHash('sha1').update(content).digest('hex')
}
