/**
 * Configuration files considered for (application, profiles), lowest
 * precedence first:
 *
 *   application.yml, application.yaml
 *   {application}.yml, {application}.yaml
 *   per profile, in request order:
 *     application-{profile}.yml, application-{profile}.yaml,
 *     {application}-{profile}.yml, {application}-{profile}.yaml
 */

export const CONFIG_EXTENSIONS = ['yml', 'yaml'] as const;

export function candidateFiles(application: string, profiles: readonly string[]): string[] {
  const bases = ['application', application];
  const files: string[] = [];

  for (const base of bases) {
    for (const ext of CONFIG_EXTENSIONS) {
      files.push(`${base}.${ext}`);
    }
  }

  for (const profile of profiles) {
    for (const base of bases) {
      for (const ext of CONFIG_EXTENSIONS) {
        files.push(`${base}-${profile}.${ext}`);
      }
    }
  }

  return files;
}
