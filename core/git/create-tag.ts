import type { CommandRunner } from '../../types/command-runner'

/**
 * Create a tag at HEAD.
 *
 * With an annotation file the tag is annotated and the file becomes its
 * message, otherwise a lightweight tag is created. Fails when the name is
 * taken or invalid.
 *
 * @param runner - Command runner.
 * @param name - Tag name.
 * @param annotationFile - Path of the message file.
 */
export async function createTag(
  runner: CommandRunner,
  name: string,
  annotationFile?: string,
): Promise<void> {
  if (annotationFile) {
    await runner.run(['tag', '-a', '-F', annotationFile, name])
  } else {
    await runner.run(['tag', name])
  }
}
