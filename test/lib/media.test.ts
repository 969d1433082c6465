/**
 * Tests for image locators
 */

import { createHash } from 'node:crypto';
import { describe, it, expect } from 'vitest';
import {
  altFromFilename,
  commonsUrl,
  imageFilename,
  parseImageLocator,
  toImageLocator,
} from '../../src/lib/media.js';

describe('imageFilename', () => {
  it('should take the last segment of an archive path', () => {
    expect(imageFilename('../I/Eiffel_Tower.jpg')).toBe('Eiffel_Tower.jpg');
  });

  it('should drop query and fragment', () => {
    expect(imageFilename('../I/Map.png?width=300#top')).toBe('Map.png');
  });

  it('should resolve thumbnail URLs to the original file', () => {
    expect(
      imageFilename('//upload.wikimedia.org/wikipedia/commons/thumb/a/ab/Apollo_11.jpg/220px-Apollo_11.jpg')
    ).toBe('Apollo_11.jpg');
  });

  it('should keep a px-prefixed name outside a thumb path', () => {
    expect(imageFilename('../I/220px-Logo.png')).toBe('220px-Logo.png');
  });

  it('should decode percent escapes and keep malformed ones', () => {
    expect(imageFilename('../I/Caf%C3%A9.jpg')).toBe('Café.jpg');
    expect(imageFilename('../I/100%_Pure.jpg')).toBe('100%_Pure.jpg');
  });
});

describe('locators', () => {
  it('should build and parse zim locators', () => {
    const locator = toImageLocator('Eiffel_Tower.jpg');
    expect(locator).toBe('zim://I/Eiffel_Tower.jpg');
    expect(parseImageLocator(locator)).toEqual({ namespace: 'I', filename: 'Eiffel_Tower.jpg' });
  });

  it('should reject other schemes', () => {
    expect(parseImageLocator('https://example.org/I/x.jpg')).toBeNull();
    expect(parseImageLocator('zim://I/')).toBeNull();
  });
});

describe('altFromFilename', () => {
  it('should drop the extension and underscores', () => {
    expect(altFromFilename('Eiffel_Tower_at_night.JPG')).toBe('Eiffel Tower at night');
    expect(altFromFilename('Chart.data.csv')).toBe('Chart.data.csv');
  });
});

describe('commonsUrl', () => {
  it('should shard by the MD5 of the underscored name', () => {
    const md5 = createHash('md5').update('Eiffel_Tower.jpg', 'utf8').digest('hex');
    expect(commonsUrl('Eiffel Tower.jpg')).toBe(
      `https://upload.wikimedia.org/wikipedia/commons/${md5.slice(0, 1)}/${md5.slice(0, 2)}/Eiffel_Tower.jpg`
    );
  });

  it('should percent-encode the file name', () => {
    expect(commonsUrl('Café.jpg')).toMatch(/\/Caf%C3%A9\.jpg$/);
  });
});
