import { confirm } from '@inquirer/prompts'

/**
 * Asks the user to approve an operation. Resolves to false when declined.
 */
export type Confirmer = (message: string) => Promise<boolean>

export const promptConfirmation: Confirmer = async (message) => {
    return await confirm({ message, default: false })
}
