/**
 * Authentication Service
 *
 * Password login for administrators. A successful login yields a signed
 * JWT that is sent back as a bearer token on admin API calls.
 */

import { compare, hash } from "bcryptjs";
import { jwtVerify, SignJWT } from "jose";
import { getDataSource } from "@/lib/db";
import { User } from "@/lib/entities";
import { env } from "@/lib/config/env";
import { AuthenticationError, ConflictError } from "@/lib/utils/errors";
import { logger } from "@/lib/utils/logger";
import type { AccessTokenResponse, UserResponse } from "@/types/cafe";

const log = logger.child({ service: "auth" });

export const TOKEN_AUDIENCE = "cafes:auth";
const BCRYPT_ROUNDS = 12;

function signingKey(): Uint8Array {
  return new TextEncoder().encode(env.SECRET_KEY);
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function hashPassword(password: string): Promise<string> {
  return hash(password, BCRYPT_ROUNDS);
}

export function verifyPassword(password: string, hashedPassword: string): Promise<boolean> {
  return compare(password, hashedPassword);
}

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    email: user.email,
    isActive: user.isActive,
    isSuperuser: user.isSuperuser,
  };
}

export async function findUserByEmail(email: string): Promise<User | null> {
  const dataSource = await getDataSource();
  return dataSource.getRepository(User).findOneBy({ email: normalizeEmail(email) });
}

/**
 * Create a user account. Emails are stored lower-cased.
 */
export async function registerUser(input: {
  email: string;
  password: string;
  isSuperuser?: boolean;
}): Promise<User> {
  const dataSource = await getDataSource();
  const repository = dataSource.getRepository(User);
  const email = normalizeEmail(input.email);

  if (await repository.existsBy({ email })) {
    throw new ConflictError("User with this email already exists");
  }

  const user = await repository.save(
    repository.create({
      email,
      hashedPassword: await hashPassword(input.password),
      isActive: true,
      isSuperuser: input.isSuperuser ?? false,
    })
  );

  log.info("User registered", { userId: user.id });
  return user;
}

/**
 * Check credentials. Unknown email, wrong password and inactive accounts
 * all fail with the same error.
 */
export async function authenticate(email: string, password: string): Promise<User> {
  const user = await findUserByEmail(email);

  if (!user || !user.isActive || !(await verifyPassword(password, user.hashedPassword))) {
    log.warn("Failed login attempt", { email: normalizeEmail(email) });
    throw new AuthenticationError("Invalid credentials");
  }

  return user;
}

export async function issueAccessToken(user: Pick<User, "id" | "email">): Promise<AccessTokenResponse> {
  const expiresIn = env.ACCESS_TOKEN_EXPIRE_MINUTES * 60;
  const issuedAt = Math.floor(Date.now() / 1000);

  const accessToken = await new SignJWT({ email: user.email })
    .setProtectedHeader({ alg: env.JWT_ALGORITHM })
    .setSubject(String(user.id))
    .setAudience(TOKEN_AUDIENCE)
    .setIssuedAt(issuedAt)
    .setExpirationTime(issuedAt + expiresIn)
    .sign(signingKey());

  return { accessToken, tokenType: "bearer", expiresIn };
}

/**
 * Resolve a bearer token to its active user
 */
export async function verifyAccessToken(token: string): Promise<User> {
  let subject: string | undefined;
  try {
    const { payload } = await jwtVerify(token, signingKey(), {
      algorithms: [env.JWT_ALGORITHM],
      audience: TOKEN_AUDIENCE,
      requiredClaims: ["exp", "sub"],
    });
    subject = payload.sub;
  } catch (error) {
    log.debug("Rejected access token", {
      reason: error instanceof Error ? error.message : String(error),
    });
    throw new AuthenticationError("Invalid or expired token");
  }

  const userId = Number(subject);
  if (!Number.isInteger(userId) || userId <= 0) {
    throw new AuthenticationError("Invalid or expired token");
  }

  const dataSource = await getDataSource();
  const user = await dataSource.getRepository(User).findOneBy({ id: userId });
  if (!user || !user.isActive) {
    throw new AuthenticationError("Invalid or expired token");
  }

  return user;
}
