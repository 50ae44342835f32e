/**
 * Marker lines delimiting a SEARCH/REPLACE block. Both the angle-bracket form
 * (`<<<<<<< SEARCH` / `>>>>>>> REPLACE`) and the dash/plus form
 * (`------- SEARCH` / `+++++++ REPLACE`) are accepted, with 5 to 9 marker characters.
 */
export interface BlockMarkers {
	search: RegExp;
	divider: RegExp;
	replace: RegExp;
}

export const DEFAULT_MARKERS: Readonly<BlockMarkers> = {
	search: /^\s*(?:<{5,9}|-{5,9}) ?SEARCH\s*$/,
	divider: /^\s*={5,9}\s*$/,
	replace: /^\s*(?:>{5,9}|\+{5,9}) ?REPLACE\s*$/,
};

/** Marker text written when markup is generated, e.g. from a unified diff */
export const SEARCH_MARKER = '------- SEARCH';
export const DIVIDER_MARKER = '=======';
export const REPLACE_MARKER = '+++++++ REPLACE';
