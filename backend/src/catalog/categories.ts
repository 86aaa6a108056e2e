export const CATEGORY_ALIASES: Readonly<Record<string, string>> = {
  cpu: 'CPU',
  processor: 'CPU',
  gpu: 'GPU',
  graphics_card: 'GPU',
  video_card: 'GPU',
  ram: 'RAM',
  memory: 'RAM',
  motherboard: 'MOTHERBOARD',
  mobo: 'MOTHERBOARD',
  storage: 'STORAGE',
  ssd: 'STORAGE',
  hdd: 'STORAGE',
  psu: 'PSU',
  power_supply: 'PSU',
  case: 'CASE',
  chassis: 'CASE',
};

export function slugifyStem(stem: string): string {
  return stem
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

export function resolveCategory(stem: string): string {
  const slug = slugifyStem(stem);
  return Object.hasOwn(CATEGORY_ALIASES, slug) ? CATEGORY_ALIASES[slug] : slug.toUpperCase();
}
