// src/config/constants.ts

// --- DI Tokens ---
/**
 * Token under which the shared axios instance is registered in the container.
 */
export const HTTP_CLIENT = 'HttpClient';

// --- Dataset Column Aliases ---
/**
 * Source column names (as found in the published CSV files, after trimming) and
 * the canonical column each one maps to. Canonical names map to themselves.
 */
export const COLUMN_ALIASES: Readonly<Record<string, string>> = {
    'Province/State': 'province_state',
    'Province_State': 'province_state',
    'province_state': 'province_state',
    'Country/Region': 'country',
    'Country_Region': 'country',
    'country': 'country',
    'ObservationDate': 'date',
    'date': 'date',
    'Last Update': 'last_update',
    'Last_Update': 'last_update',
    'last_update': 'last_update',
    'Confirmed': 'confirmed',
    'confirmed': 'confirmed',
    'Deaths': 'deaths',
    'deaths': 'deaths',
    'Recovered': 'recovered',
    'recovered': 'recovered',
    'Latitude': 'lat',
    'Lat': 'lat',
    'lat': 'lat',
    'Longitude': 'lon',
    'Long_': 'lon',
    'Long': 'lon',
    'lon': 'lon',
};

/**
 * Country value used when a row carries no country at all.
 */
export const UNKNOWN_COUNTRY = 'Unknown';
