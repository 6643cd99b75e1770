/**
 * @jest-environment node
 */

import {
  cafeDocument,
  cosineSimilarity,
  rankSimilarCafes,
  tfidfVectors,
  tokenize,
} from '@/lib/services/recommendations'
import { NotFoundError } from '@/lib/utils/errors'
import type { CafeResponse } from '@/types/cafe'

const cafe = (id: number, description: string, overrides: Partial<CafeResponse> = {}): CafeResponse => ({
  id,
  name: `Cafe ${id}`,
  city: 'Lisbon',
  address: null,
  openingHours: null,
  description,
  imageUrl: null,
  bestFor: null,
  alsoGoodFor: [],
  ...overrides,
})

describe('Recommendations', () => {
  describe('tokenize', () => {
    it('should lower-case and keep words of two or more characters', () => {
      expect(tokenize("It's a Flat-White, OK?")).toEqual(['it', 'flat', 'white', 'ok'])
    })

    it('should keep accented words whole', () => {
      expect(tokenize('Café crème brûlée')).toEqual(['café', 'crème', 'brûlée'])
    })

    it('should not let accented words share fragments with unrelated words', () => {
      const [dessert, phone] = tfidfVectors(['crème brûlée', 'call me'])

      expect(cosineSimilarity(dessert, phone)).toBe(0)
    })

    it('should return nothing for blank text', () => {
      expect(tokenize('  ')).toEqual([])
    })
  })

  describe('cafeDocument', () => {
    it('should join description and category names', () => {
      expect(
        cafeDocument({ description: 'Sunny terrace', bestFor: 'Breakfast', alsoGoodFor: ['Dates', 'Family'] })
      ).toBe('Sunny terrace Breakfast Dates Family')
    })
  })

  describe('tfidfVectors', () => {
    it('should weight rarer terms higher and normalise each vector', () => {
      const [first, second] = tfidfVectors(['coffee tea', 'coffee'])
      const teaIdf = Math.log(3 / 2) + 1
      const norm = Math.sqrt(1 + teaIdf * teaIdf)

      expect(first.get('coffee')).toBeCloseTo(1 / norm, 10)
      expect(first.get('tea')).toBeCloseTo(teaIdf / norm, 10)
      expect(second.get('coffee')).toBeCloseTo(1, 10)
    })

    it('should count repeated terms', () => {
      const [vector] = tfidfVectors(['latte latte mocha', 'latte mocha'])

      // both terms appear in every document, so only the counts differ
      expect(vector.get('latte')).toBeCloseTo(2 / Math.sqrt(5), 10)
      expect(vector.get('mocha')).toBeCloseTo(1 / Math.sqrt(5), 10)
    })

    it('should leave an empty document as an empty vector', () => {
      const [empty] = tfidfVectors(['', 'espresso'])
      expect(empty.size).toBe(0)
    })
  })

  describe('cosineSimilarity', () => {
    it('should be 1 for identical documents and 0 for disjoint ones', () => {
      const [a, b, c] = tfidfVectors(['pour over', 'pour over', 'matcha'])

      expect(cosineSimilarity(a, b)).toBeCloseTo(1, 10)
      expect(cosineSimilarity(a, c)).toBe(0)
    })
  })

  describe('rankSimilarCafes', () => {
    it('should order the other cafes by similarity', () => {
      const cafes = [
        cafe(1, 'espresso and single origin beans'),
        cafe(2, 'matcha and cake'),
        cafe(3, 'single origin espresso beans roasted daily'),
      ]

      expect(rankSimilarCafes(cafes, 1).map((c) => c.id)).toEqual([3, 2])
    })

    it('should take categories into account', () => {
      const cafes = [
        cafe(1, 'corner spot', { bestFor: 'Remote work' }),
        cafe(2, 'corner spot', { bestFor: 'Dates' }),
        cafe(3, 'another place', { alsoGoodFor: ['Remote work'] }),
      ]

      expect(rankSimilarCafes(cafes, 3).map((c) => c.id)).toEqual([1, 2])
    })

    it('should keep input order for equal scores and cap the result', () => {
      const cafes = [
        cafe(1, 'espresso'),
        cafe(2, 'matcha'),
        cafe(3, 'chai'),
        cafe(4, 'cocoa'),
        cafe(5, 'kombucha'),
      ]

      expect(rankSimilarCafes(cafes, 1).map((c) => c.id)).toEqual([2, 3, 4])
      expect(rankSimilarCafes(cafes, 1, 1).map((c) => c.id)).toEqual([2])
    })

    it('should return nothing when the target is the only cafe', () => {
      expect(rankSimilarCafes([cafe(1, 'espresso')], 1)).toEqual([])
    })

    it('should throw NotFoundError for an unknown target', () => {
      expect(() => rankSimilarCafes([cafe(1, 'espresso')], 2)).toThrow(NotFoundError)
      expect(() => rankSimilarCafes([], 2)).toThrow('Cafe not found: 2')
    })
  })
})
