import { Region } from '../types/news.types';

// Google News locale parameters: hl / gl / ceid.
export const REGIONS: Region[] = [
  // Asia
  {
    code: 'tw',
    name: 'Taiwan',
    localeLanguage: 'zh-TW',
    countryCode: 'TW',
    feedRegionId: 'TW:zh-Hant',
  },
  {
    code: 'hk',
    name: 'Hong Kong',
    localeLanguage: 'zh-HK',
    countryCode: 'HK',
    feedRegionId: 'HK:zh-Hant',
  },
  {
    code: 'cn',
    name: 'China',
    localeLanguage: 'zh-CN',
    countryCode: 'CN',
    feedRegionId: 'CN:zh-Hans',
  },
  {
    code: 'jp',
    name: 'Japan',
    localeLanguage: 'ja',
    countryCode: 'JP',
    feedRegionId: 'JP:ja',
  },
  {
    code: 'kr',
    name: 'South Korea',
    localeLanguage: 'ko',
    countryCode: 'KR',
    feedRegionId: 'KR:ko',
  },
  {
    code: 'sg',
    name: 'Singapore',
    localeLanguage: 'en-SG',
    countryCode: 'SG',
    feedRegionId: 'SG:en',
  },
  {
    code: 'in',
    name: 'India',
    localeLanguage: 'en-IN',
    countryCode: 'IN',
    feedRegionId: 'IN:en',
  },
  // Americas
  {
    code: 'us',
    name: 'United States',
    localeLanguage: 'en-US',
    countryCode: 'US',
    feedRegionId: 'US:en',
  },
  {
    code: 'ca',
    name: 'Canada',
    localeLanguage: 'en-CA',
    countryCode: 'CA',
    feedRegionId: 'CA:en',
  },
  {
    code: 'mx',
    name: 'Mexico',
    localeLanguage: 'es-MX',
    countryCode: 'MX',
    feedRegionId: 'MX:es',
  },
  {
    code: 'br',
    name: 'Brazil',
    localeLanguage: 'pt-BR',
    countryCode: 'BR',
    feedRegionId: 'BR:pt',
  },
  // Europe
  {
    code: 'uk',
    name: 'United Kingdom',
    localeLanguage: 'en-GB',
    countryCode: 'GB',
    feedRegionId: 'GB:en',
  },
  {
    code: 'de',
    name: 'Germany',
    localeLanguage: 'de',
    countryCode: 'DE',
    feedRegionId: 'DE:de',
  },
  {
    code: 'fr',
    name: 'France',
    localeLanguage: 'fr',
    countryCode: 'FR',
    feedRegionId: 'FR:fr',
  },
  {
    code: 'it',
    name: 'Italy',
    localeLanguage: 'it',
    countryCode: 'IT',
    feedRegionId: 'IT:it',
  },
  {
    code: 'es',
    name: 'Spain',
    localeLanguage: 'es',
    countryCode: 'ES',
    feedRegionId: 'ES:es',
  },
  {
    code: 'nl',
    name: 'Netherlands',
    localeLanguage: 'nl',
    countryCode: 'NL',
    feedRegionId: 'NL:nl',
  },
  // Oceania
  {
    code: 'au',
    name: 'Australia',
    localeLanguage: 'en-AU',
    countryCode: 'AU',
    feedRegionId: 'AU:en',
  },
  {
    code: 'nz',
    name: 'New Zealand',
    localeLanguage: 'en-NZ',
    countryCode: 'NZ',
    feedRegionId: 'NZ:en',
  },
];

export const DEFAULT_REGION_CODE = 'us';
