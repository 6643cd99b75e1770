/**
 * @jest-environment node
 */

import { NextRequest } from 'next/server'
import { GET as listCafes, POST as createCafe } from '@/app/api/cafes/route'
import { DELETE as deleteCafe, GET as getCafe, PUT as updateCafe } from '@/app/api/cafes/[id]/route'
import { GET as recommend } from '@/app/api/cafes/[id]/recommend/route'
import { GET as listCategories } from '@/app/api/categories/route'
import { closeDataSource, getDataSource, resetDatabase } from '@/lib/db'
import { CafeCategory } from '@/lib/entities'
import {
  apiRequest,
  createAdminToken,
  createMockCafe,
  routeContext,
  seedCategories,
} from '../utils/test-helpers'

describe('/api/cafes', () => {
  let token: string

  beforeEach(async () => {
    await resetDatabase()
    await seedCategories()
    token = await createAdminToken()
  })

  afterAll(async () => {
    await closeDataSource()
  })

  async function addCafe(overrides: Record<string, unknown> = {}) {
    const response = await createCafe(
      apiRequest('/api/cafes', { method: 'POST', body: createMockCafe(overrides), token }),
      routeContext({})
    )
    expect(response.status).toBe(201)
    const body = await response.json()
    return body.data
  }

  async function names(query = '') {
    const response = await listCafes(apiRequest(`/api/cafes${query}`))
    const body = await response.json()
    expect(response.status).toBe(200)
    expect(body.meta.total).toBe(body.data.length)
    return body.data.map((cafe: { name: string }) => cafe.name)
  }

  describe('GET', () => {
    it('should return an empty list when there are no cafes', async () => {
      const response = await listCafes(apiRequest('/api/cafes'))
      const body = await response.json()

      expect(response.status).toBe(200)
      expect(body.success).toBe(true)
      expect(body.data).toEqual([])
      expect(body.meta.total).toBe(0)
    })

    it('should list cafes ordered by name', async () => {
      await addCafe({ name: 'Page & Pour', city: 'Porto' })
      await addCafe({ name: 'Harbour Roasters' })

      expect(await names()).toEqual(['Harbour Roasters', 'Page & Pour'])
    })

    describe('filters', () => {
      beforeEach(async () => {
        await addCafe({ name: 'Harbour Roasters', city: 'Lisbon', bestFor: 'Coffee', alsoGoodFor: ['Breakfast'] })
        await addCafe({
          name: 'Page & Pour',
          city: 'Porto',
          bestFor: 'Quiet reading',
          alsoGoodFor: ['Coffee', 'Remote work'],
        })
        await addCafe({ name: 'Laptop Lane', city: 'Lisbon', bestFor: 'Remote work', alsoGoodFor: ['Coffee'] })
      })

      it('should match city case-insensitively by substring', async () => {
        expect(await names('?city=lis')).toEqual(['Harbour Roasters', 'Laptop Lane'])
      })

      it('should match the Best For category exactly', async () => {
        expect(await names('?bestFor=Remote%20work')).toEqual(['Laptop Lane'])
      })

      it('should match any of the additional categories', async () => {
        expect(await names('?alsoGoodFor=Coffee')).toEqual(['Laptop Lane', 'Page & Pour'])
        expect(await names('?alsoGoodFor=Breakfast,Remote%20work')).toEqual(['Harbour Roasters', 'Page & Pour'])
        expect(await names('?alsoGoodFor=Breakfast&alsoGoodFor=Remote%20work')).toEqual([
          'Harbour Roasters',
          'Page & Pour',
        ])
      })

      it('should combine filters', async () => {
        expect(await names('?city=Lisbon&alsoGoodFor=Coffee')).toEqual(['Laptop Lane'])
        expect(await names('?city=Porto&bestFor=Coffee')).toEqual([])
      })

      it('should reject unknown categories', async () => {
        const response = await listCafes(apiRequest('/api/cafes?bestFor=Brunch&alsoGoodFor=Vegan'))
        const body = await response.json()

        expect(response.status).toBe(400)
        expect(body).toEqual({
          error: 'Categories do not exist: Brunch, Vegan',
          code: 'VALIDATION_ERROR',
          details: { missing: ['Brunch', 'Vegan'] },
        })
      })
    })
  })

  describe('POST', () => {
    it('should create a cafe with its categories', async () => {
      const response = await createCafe(
        apiRequest('/api/cafes', {
          method: 'POST',
          body: createMockCafe({ alsoGoodFor: ['Remote work', 'Breakfast'] }),
          token,
        }),
        routeContext({})
      )
      const body = await response.json()

      expect(response.status).toBe(201)
      expect(body.data).toEqual({
        id: expect.any(Number),
        name: 'Harbour Roasters',
        city: 'Lisbon',
        address: 'Rua do Cais 12',
        openingHours: 'Mon-Fri 8:00-18:00',
        description: 'Single origin espresso and fresh pastries by the river.',
        imageUrl: 'https://images.example.com/harbour.jpg',
        bestFor: 'Coffee',
        alsoGoodFor: ['Breakfast', 'Remote work'],
      })
    })

    it('should store blank optional fields as null', async () => {
      const cafe = await addCafe({ address: '', openingHours: '  ', imageUrl: '', alsoGoodFor: [] })

      expect(cafe.address).toBeNull()
      expect(cafe.openingHours).toBeNull()
      expect(cafe.imageUrl).toBeNull()
      expect(cafe.alsoGoodFor).toEqual([])
    })

    it('should require authentication', async () => {
      const response = await createCafe(
        apiRequest('/api/cafes', { method: 'POST', body: createMockCafe() }),
        routeContext({})
      )

      expect(response.status).toBe(401)
      expect(await response.json()).toEqual({
        error: 'Authentication required',
        code: 'AUTHENTICATION_ERROR',
      })
    })

    it('should reject an invalid token', async () => {
      const response = await createCafe(
        apiRequest('/api/cafes', { method: 'POST', body: createMockCafe(), token: 'not-a-token' }),
        routeContext({})
      )

      expect(response.status).toBe(401)
      expect((await response.json()).error).toBe('Invalid or expired token')
    })

    it('should reject a duplicate name and city', async () => {
      await addCafe()

      const response = await createCafe(
        apiRequest('/api/cafes', { method: 'POST', body: createMockCafe({ description: 'Again' }), token }),
        routeContext({})
      )

      expect(response.status).toBe(409)
      expect(await response.json()).toEqual({
        error: 'Cafe with this name and city already exists',
        code: 'CONFLICT',
        details: { name: 'Harbour Roasters', city: 'Lisbon' },
      })
    })

    it('should allow the same name in another city', async () => {
      await addCafe()
      const other = await addCafe({ city: 'Porto' })

      expect(other.city).toBe('Porto')
      expect(await names()).toEqual(['Harbour Roasters', 'Harbour Roasters'])
    })

    it('should reject unknown categories', async () => {
      const response = await createCafe(
        apiRequest('/api/cafes', { method: 'POST', body: createMockCafe({ bestFor: 'Brunch' }), token }),
        routeContext({})
      )

      expect(response.status).toBe(400)
      expect((await response.json()).error).toBe('Categories do not exist: Brunch')
      expect(await names()).toEqual([])
    })

    it('should reject a Best For category repeated in Also good for', async () => {
      const response = await createCafe(
        apiRequest('/api/cafes', {
          method: 'POST',
          body: createMockCafe({ bestFor: 'Coffee', alsoGoodFor: ['Coffee'] }),
          token,
        }),
        routeContext({})
      )

      expect(response.status).toBe(400)
      expect(await response.json()).toEqual({
        error: 'Validation failed',
        code: 'VALIDATION_ERROR',
        details: [
          { path: 'alsoGoodFor', message: 'Best For category cannot also be listed under Also good for' },
        ],
      })
    })

    it('should reject missing required fields', async () => {
      const response = await createCafe(
        apiRequest('/api/cafes', { method: 'POST', body: createMockCafe({ name: '' }), token }),
        routeContext({})
      )
      const body = await response.json()

      expect(response.status).toBe(400)
      expect(body.details).toEqual([{ path: 'name', message: 'Name is required' }])
    })

    it('should reject a malformed JSON body', async () => {
      const request = new NextRequest('http://localhost:3000/api/cafes', {
        method: 'POST',
        headers: { authorization: `Bearer ${token}`, 'content-type': 'application/json' },
        body: '{"name":',
      })

      const response = await createCafe(request, routeContext({}))

      expect(response.status).toBe(400)
      expect((await response.json()).error).toBe('Request body must be valid JSON')
    })
  })

  describe('/api/cafes/[id]', () => {
    it('should return a single cafe', async () => {
      const cafe = await addCafe()

      const response = await getCafe(apiRequest(`/api/cafes/${cafe.id}`), routeContext({ id: String(cafe.id) }))

      expect(response.status).toBe(200)
      expect((await response.json()).data).toEqual(cafe)
    })

    it('should return 404 for an unknown cafe', async () => {
      const response = await getCafe(apiRequest('/api/cafes/999'), routeContext({ id: '999' }))

      expect(response.status).toBe(404)
      expect(await response.json()).toEqual({ error: 'Cafe not found: 999', code: 'NOT_FOUND' })
    })

    it('should reject a non-numeric id', async () => {
      const response = await getCafe(apiRequest('/api/cafes/abc'), routeContext({ id: 'abc' }))
      const body = await response.json()

      expect(response.status).toBe(400)
      expect(body.code).toBe('VALIDATION_ERROR')
    })

    it('should only accept plain decimal ids', async () => {
      await addCafe()

      for (const id of ['0x1', '1e0', ' 1', '1.0']) {
        const response = await getCafe(apiRequest('/api/cafes/1'), routeContext({ id }))

        expect(response.status).toBe(400)
        expect((await response.json()).details).toEqual([
          { path: '', message: 'Cafe id must be a positive integer' },
        ])
      }
    })

    it('should reject id zero', async () => {
      const response = await getCafe(apiRequest('/api/cafes/0'), routeContext({ id: '0' }))

      expect(response.status).toBe(400)
      expect((await response.json()).details).toEqual([{ path: '', message: 'Cafe id must be positive' }])
    })

    it('should replace fields and categories on update', async () => {
      const cafe = await addCafe()

      const response = await updateCafe(
        apiRequest(`/api/cafes/${cafe.id}`, {
          method: 'PUT',
          token,
          body: createMockCafe({
            city: 'Porto',
            address: null,
            bestFor: 'Remote work',
            alsoGoodFor: ['Coffee', 'Quiet reading'],
          }),
        }),
        routeContext({ id: String(cafe.id) })
      )

      expect(response.status).toBe(200)
      expect((await response.json()).data).toMatchObject({
        id: cafe.id,
        city: 'Porto',
        address: null,
        bestFor: 'Remote work',
        alsoGoodFor: ['Coffee', 'Quiet reading'],
      })

      const reread = await getCafe(apiRequest(`/api/cafes/${cafe.id}`), routeContext({ id: String(cafe.id) }))
      const { data } = await reread.json()
      expect(data.city).toBe('Porto')
      expect(data.bestFor).toBe('Remote work')
      expect(await names('?city=Lisbon')).toEqual([])
    })

    it('should allow an update that keeps its own name and city', async () => {
      const cafe = await addCafe()

      const response = await updateCafe(
        apiRequest(`/api/cafes/${cafe.id}`, {
          method: 'PUT',
          token,
          body: createMockCafe({ description: 'New roaster, same view.' }),
        }),
        routeContext({ id: String(cafe.id) })
      )

      expect(response.status).toBe(200)
      expect((await response.json()).data.description).toBe('New roaster, same view.')
    })

    it('should reject an update onto another cafe name and city', async () => {
      await addCafe()
      const other = await addCafe({ name: 'Laptop Lane' })

      const response = await updateCafe(
        apiRequest(`/api/cafes/${other.id}`, { method: 'PUT', token, body: createMockCafe() }),
        routeContext({ id: String(other.id) })
      )

      expect(response.status).toBe(409)
    })

    it('should return 404 when updating an unknown cafe', async () => {
      const response = await updateCafe(
        apiRequest('/api/cafes/42', { method: 'PUT', token, body: createMockCafe() }),
        routeContext({ id: '42' })
      )

      expect(response.status).toBe(404)
      expect((await response.json()).error).toBe('Cafe not found: 42')
    })

    it('should delete a cafe and its category links', async () => {
      const cafe = await addCafe()

      const response = await deleteCafe(
        apiRequest(`/api/cafes/${cafe.id}`, { method: 'DELETE', token }),
        routeContext({ id: String(cafe.id) })
      )

      expect(response.status).toBe(200)
      expect((await response.json()).data).toEqual({ message: 'Cafe deleted', id: cafe.id })

      const reread = await getCafe(apiRequest(`/api/cafes/${cafe.id}`), routeContext({ id: String(cafe.id) }))
      expect(reread.status).toBe(404)
      expect(await names()).toEqual([])

      const dataSource = await getDataSource()
      expect(await dataSource.getRepository(CafeCategory).count()).toBe(0)
    })

    it('should return 404 when deleting an unknown cafe', async () => {
      const response = await deleteCafe(
        apiRequest('/api/cafes/7', { method: 'DELETE', token }),
        routeContext({ id: '7' })
      )

      expect(response.status).toBe(404)
    })

    it('should require authentication for update and delete', async () => {
      const cafe = await addCafe()
      const context = routeContext({ id: String(cafe.id) })

      const put = await updateCafe(
        apiRequest(`/api/cafes/${cafe.id}`, { method: 'PUT', body: createMockCafe({ city: 'Porto' }) }),
        context
      )
      const del = await deleteCafe(apiRequest(`/api/cafes/${cafe.id}`, { method: 'DELETE' }), context)

      expect(put.status).toBe(401)
      expect(del.status).toBe(401)
      expect(await names()).toEqual(['Harbour Roasters'])
    })
  })

  describe('/api/cafes/[id]/recommend', () => {
    it('should return the other cafes, most similar first', async () => {
      const target = await addCafe({
        name: 'Harbour Roasters',
        description: 'Espresso bar with single origin beans',
        bestFor: 'Coffee',
        alsoGoodFor: [],
      })
      await addCafe({
        name: 'Quiet Corner',
        description: 'Reading nook with soft chairs',
        bestFor: 'Quiet reading',
        alsoGoodFor: [],
      })
      await addCafe({
        name: 'Bean Counter',
        description: 'Espresso and filter coffee from single origin beans',
        bestFor: 'Coffee',
        alsoGoodFor: [],
      })

      const response = await recommend(
        apiRequest(`/api/cafes/${target.id}/recommend`),
        routeContext({ id: String(target.id) })
      )
      const body = await response.json()

      expect(response.status).toBe(200)
      expect(body.data.map((cafe: { name: string }) => cafe.name)).toEqual(['Bean Counter', 'Quiet Corner'])
    })

    it('should return 404 for an unknown cafe', async () => {
      const response = await recommend(apiRequest('/api/cafes/5/recommend'), routeContext({ id: '5' }))

      expect(response.status).toBe(404)
    })
  })

  describe('/api/categories', () => {
    it('should list categories by name', async () => {
      const response = await listCategories()
      const body = await response.json()

      expect(response.status).toBe(200)
      expect(body.data.map((category: { name: string }) => category.name)).toEqual([
        'Breakfast',
        'Coffee',
        'Dates',
        'Quiet reading',
        'Remote work',
      ])
    })
  })
})
