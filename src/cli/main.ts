#!/usr/bin/env node

import { isGraphformError } from "../core/errors/taxonomy"
import { getLogger } from "../log/utils"
import { ErrorUtils } from "../tools/error-utils"
import { buildProgram } from "./program"

const logger = getLogger("main")

buildProgram().parseAsync(process.argv).catch((error: unknown) => {
    logger.debug("Command failed", { error: isGraphformError(error) ? error.toJSON() : ErrorUtils.extractErrorMessage(error) })

    console.error(`Error: ${ErrorUtils.extractErrorMessage(error)}`)
    if (isGraphformError(error)) {
        for (const suggestion of error.getDetails().suggestions ?? []) {
            console.error(`  - ${suggestion}`)
        }
    }
    process.exitCode = 1
})
