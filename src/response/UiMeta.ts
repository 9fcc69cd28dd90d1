/**
 * Metadata snapshot consumed by the static dashboard.
 */

export interface EnvironmentMeta {
  name: string;
  repo_url: string;
  branch: string;
  workdir: string;
  subpath: string;
  last_commit: string;
  last_commit_date: string;
}

export interface UiMeta {
  base_path: string;
  environments: EnvironmentMeta[];
  auth_enabled: boolean;
}

export const META_PLACEHOLDER = '__META_JSON__';

/**
 * Embed the snapshot in the dashboard page. `<` is escaped so a value can
 * never close the surrounding script element.
 */
export function renderUiPage(template: string, meta: UiMeta): string {
  const json = JSON.stringify(meta).replace(/</g, '\\u003c');
  return template.split(META_PLACEHOLDER).join(json);
}
