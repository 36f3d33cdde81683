/** Category id -> display name for every category the sampler searches */
export const DEFAULT_CATEGORIES: Readonly<Record<string, string>> = {
  '1': 'Film & Animation',
  '2': 'Autos & Vehicles',
  '10': 'Music',
  '15': 'Pets & Animals',
  '17': 'Sports',
  '19': 'Travel & Events',
  '20': 'Gaming',
  '22': 'People & Blogs',
  '23': 'Comedy',
  '24': 'Entertainment',
  '25': 'News & Politics',
  '26': 'Howto & Style',
  '27': 'Education',
  '28': 'Science & Technology',
  '29': 'Nonprofits & Activism',
};

export const UNKNOWN_CATEGORY = 'Unknown';

const EU = [
  'GB',
  'IE',
  'DE',
  'FR',
  'NL',
  'SE',
  'DK',
  'FI',
  'NO',
  'AT',
  'BE',
  'IT',
  'ES',
  'PT',
  'PL',
];

export const REGION_PRESETS: Readonly<Record<string, readonly string[]>> = {
  US: ['US'],
  EU,
  US_EU: ['US', ...EU.slice(0, 9)],
};

/**
 * Unknown names pass through as a single literal region code, so a new
 * code works without touching the presets.
 */
export function resolveRegions(region: string): string[] {
  const token = region.trim();
  const preset = Object.prototype.hasOwnProperty.call(REGION_PRESETS, token)
    ? REGION_PRESETS[token]
    : undefined;
  return preset ? [...preset] : [token];
}

export function resolveCategories(categories?: readonly string[]): string[] {
  if (!categories || categories.length === 0) {
    return Object.keys(DEFAULT_CATEGORIES);
  }
  return [...categories];
}

export function categoryName(categoryId?: string): string {
  if (!categoryId) return UNKNOWN_CATEGORY;
  return Object.prototype.hasOwnProperty.call(DEFAULT_CATEGORIES, categoryId)
    ? DEFAULT_CATEGORIES[categoryId]
    : UNKNOWN_CATEGORY;
}
