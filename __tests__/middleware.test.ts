/**
 * @jest-environment node
 */

import { NextRequest } from 'next/server'
import { middleware } from '@/middleware'

const request = (method: string, origin?: string) =>
  new NextRequest('http://localhost:3000/api/cafes', {
    method,
    headers: origin ? { origin } : {},
  })

describe('CORS middleware', () => {
  it('should answer preflight requests from allowed origins', () => {
    const response = middleware(request('OPTIONS', 'http://localhost:3000'))

    expect(response.status).toBe(204)
    expect(response.headers.get('Access-Control-Allow-Origin')).toBe('http://localhost:3000')
    expect(response.headers.get('Access-Control-Allow-Methods')).toBe('GET, POST, PUT, DELETE, OPTIONS')
    expect(response.headers.get('Access-Control-Allow-Headers')).toBe('Content-Type, Authorization')
    expect(response.headers.get('Access-Control-Allow-Credentials')).toBe('true')
  })

  it('should add CORS headers to requests from allowed origins', () => {
    const response = middleware(request('GET', 'http://localhost:3000'))

    expect(response.headers.get('Access-Control-Allow-Origin')).toBe('http://localhost:3000')
    expect(response.headers.get('Vary')).toBe('Origin')
  })

  it('should not add CORS headers for other origins', () => {
    const response = middleware(request('GET', 'https://elsewhere.example.com'))

    expect(response.headers.get('Access-Control-Allow-Origin')).toBeNull()
  })

  it('should leave same-origin requests alone', () => {
    const response = middleware(request('GET'))

    expect(response.headers.get('Access-Control-Allow-Origin')).toBeNull()
  })
})
