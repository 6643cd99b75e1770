/**
 * @jest-environment node
 */

import { NextRequest } from 'next/server'
import { ValidationError } from '@/lib/utils/errors'
import { readJson } from '@/lib/utils/request'

const post = (body?: string) =>
  new NextRequest('http://localhost:3000/api/cafes', {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body,
  })

describe('readJson', () => {
  it('should return the parsed body', async () => {
    expect(await readJson(post('{"name":"Harbour Roasters"}'))).toEqual({ name: 'Harbour Roasters' })
  })

  it('should reject a truncated body with a validation error', async () => {
    await expect(readJson(post('{"name":'))).rejects.toBeInstanceOf(ValidationError)
    await expect(readJson(post('{"name":'))).rejects.toThrow('Request body must be valid JSON')
  })

  it('should reject an empty body', async () => {
    await expect(readJson(post())).rejects.toThrow('Request body must be valid JSON')
  })
})
