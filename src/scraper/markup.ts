import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';

/**
 * Strips the age-rating badges Genie nests as spans inside title cells.
 */
export function textWithoutSpans($el: cheerio.Cheerio<Element>): string {
    const clone = $el.clone();
    clone.find('span').remove();
    return clone.text().trim();
}

/**
 * Reads a row of the `info-data` lists on album and song pages.
 *
 * Genie labels each row with an image (`<span class="attr"><img alt="발매일"></span>`)
 * followed by a `.value` sibling holding the text.
 */
export function infoValue($: cheerio.CheerioAPI, label: string): string | null {
    const value = $(`img[alt="${label}"]`).first().parent().nextAll('.value').first();
    if (value.length === 0) return null;
    return value.text().trim();
}
