import {
  RequirementMissingError,
  type PrivilegeEscalation,
  type RequirementResolver,
} from '@upkeep/core'

/**
 * Escalation programs tried in order.
 */
export const PRIVILEGE_ESCALATION_PROGRAMS = ['sudo', 'doas', 'pkexec', 'run0'] as const

/**
 * Detects the first installed privilege-escalation program.
 *
 * @param requirements Requirement resolver used for the lookup.
 * @param candidates Programs to try in order.
 * @returns Escalation collaborator; `program` is null when none is installed.
 */
export const detectPrivilegeEscalation = async (
  requirements: RequirementResolver,
  candidates: readonly string[] = PRIVILEGE_ESCALATION_PROGRAMS
): Promise<PrivilegeEscalation> => {
  for (const candidate of candidates) {
    const lookup = await requirements.lookup(candidate)
    if (lookup.found) {
      return createPrivilegeEscalation(lookup.path)
    }
  }

  return createPrivilegeEscalation(null)
}

/**
 * Creates an escalation collaborator around a known program.
 *
 * @param program Absolute escalation program path, or null.
 * @returns Escalation collaborator.
 */
export const createPrivilegeEscalation = (program: string | null): PrivilegeEscalation => {
  return {
    program,
    wrap: (target: string, args: readonly string[]) => {
      if (program === null) {
        throw new RequirementMissingError('sudo')
      }

      return { program, args: [target, ...args] }
    },
  }
}
