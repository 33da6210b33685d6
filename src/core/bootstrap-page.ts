import { readFileSync } from 'node:fs';

const PAGE_URL = new URL('../../assets/site.html', import.meta.url);
const UPGRADE_PATH_PLACEHOLDER = '%UPGRADE_PATH%';

let bundledPage: string | null = null;

/** The page served on `GET /`, read once from `assets/site.html`. */
export function loadBundledPage(): string {
  bundledPage ??= readFileSync(PAGE_URL, 'utf-8');
  return bundledPage;
}

/** Points the page's WebSocket at the configured upgrade path. */
export function renderBootstrapPage(upgradePath: string, template: string = loadBundledPage()): string {
  return template.replaceAll(UPGRADE_PATH_PLACEHOLDER, upgradePath);
}
