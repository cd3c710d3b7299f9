import { confirm, isCancel } from '@clack/prompts'

/** Yes/no question; Ctrl+C and Esc count as no. */
export async function confirmAction(message: string): Promise<boolean> {
  const answer = await confirm({ message, initialValue: false })
  return !isCancel(answer) && answer === true
}
