import { CONFIG } from '../config/constants';

export const hasColdStartMarker = (url: string, marker: string = CONFIG.COLD_START.MARKER): boolean => {
  const queryStart = url.indexOf('?');
  if (queryStart === -1) return false;

  const hashStart = url.indexOf('#', queryStart);
  const query = url.slice(queryStart + 1, hashStart === -1 ? undefined : hashStart);
  return query.split('&').some(param => param === marker || param.startsWith(`${marker}=`));
};

// Appends the bare `?coldstart` flag; a URL that already carries it is returned unchanged
export const withColdStartMarker = (url: string, marker: string = CONFIG.COLD_START.MARKER): string => {
  if (hasColdStartMarker(url, marker)) return url;

  const hashStart = url.indexOf('#');
  const base = hashStart === -1 ? url : url.slice(0, hashStart);
  const hash = hashStart === -1 ? '' : url.slice(hashStart);

  let separator = '?';
  if (base.includes('?')) {
    separator = base.endsWith('?') || base.endsWith('&') ? '' : '&';
  }

  return `${base}${separator}${marker}${hash}`;
};
