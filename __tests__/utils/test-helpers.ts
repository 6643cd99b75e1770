import { hash } from 'bcryptjs'
import { NextRequest } from 'next/server'
import { getDataSource } from '@/lib/db'
import { Category, User } from '@/lib/entities'
import { issueAccessToken } from '@/lib/services/auth'

export const TEST_CATEGORIES = ['Breakfast', 'Coffee', 'Dates', 'Quiet reading', 'Remote work']

export const ADMIN_EMAIL = 'admin@example.com'
export const ADMIN_PASSWORD = 'test-password'

// bcrypt at cost 12 is slow; hash each password once per test file
const hashes = new Map<string, Promise<string>>()

function hashOnce(password: string): Promise<string> {
  let pending = hashes.get(password)
  if (!pending) {
    pending = hash(password, 12)
    hashes.set(password, pending)
  }
  return pending
}

export async function seedCategories(names: string[] = TEST_CATEGORIES): Promise<Category[]> {
  const repository = (await getDataSource()).getRepository(Category)
  return repository.save(names.map((name) => repository.create({ name })))
}

export async function createTestUser(
  overrides: { email?: string; password?: string; isActive?: boolean } = {}
): Promise<User> {
  const repository = (await getDataSource()).getRepository(User)
  return repository.save(
    repository.create({
      email: overrides.email ?? ADMIN_EMAIL,
      hashedPassword: await hashOnce(overrides.password ?? ADMIN_PASSWORD),
      isActive: overrides.isActive ?? true,
      isSuperuser: true,
    })
  )
}

export async function createAdminToken(): Promise<string> {
  const user = await createTestUser()
  const { accessToken } = await issueAccessToken(user)
  return accessToken
}

export const createMockCafe = (overrides: Record<string, unknown> = {}) => ({
  name: 'Harbour Roasters',
  city: 'Lisbon',
  address: 'Rua do Cais 12',
  openingHours: 'Mon-Fri 8:00-18:00',
  description: 'Single origin espresso and fresh pastries by the river.',
  imageUrl: 'https://images.example.com/harbour.jpg',
  bestFor: 'Coffee',
  alsoGoodFor: ['Breakfast'],
  ...overrides,
})

export function apiRequest(
  path: string,
  options: { method?: string; body?: unknown; token?: string; headers?: Record<string, string> } = {}
): NextRequest {
  const headers = new Headers(options.headers)
  if (options.body !== undefined) {
    headers.set('content-type', 'application/json')
  }
  if (options.token) {
    headers.set('authorization', `Bearer ${options.token}`)
  }

  return new NextRequest(`http://localhost:3000${path}`, {
    method: options.method ?? 'GET',
    headers,
    body: options.body === undefined ? undefined : JSON.stringify(options.body),
  })
}

export function routeContext<P extends Record<string, string>>(params: P) {
  return { params: Promise.resolve(params) }
}
