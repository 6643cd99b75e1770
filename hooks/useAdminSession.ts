/**
 * Admin Session Hook
 *
 * Keeps the admin bearer token in localStorage and checks it against
 * /api/auth/me on load. Any 401 from the API should end the session.
 */

import { useCallback, useEffect, useState } from "react";
import { fetchCurrentUser, login as requestToken } from "@/lib/api-client";
import type { UserResponse } from "@/types/cafe";

export const TOKEN_STORAGE_KEY = "cafes-admin-token";

export type AdminSessionStatus = "loading" | "signed-out" | "signed-in";

export function useAdminSession() {
  const [token, setToken] = useState<string | null>(null);
  const [user, setUser] = useState<UserResponse | null>(null);
  const [status, setStatus] = useState<AdminSessionStatus>("loading");

  const logout = useCallback(() => {
    localStorage.removeItem(TOKEN_STORAGE_KEY);
    setToken(null);
    setUser(null);
    setStatus("signed-out");
  }, []);

  const adopt = useCallback(async (candidate: string) => {
    const me = await fetchCurrentUser(candidate);
    localStorage.setItem(TOKEN_STORAGE_KEY, candidate);
    setToken(candidate);
    setUser(me);
    setStatus("signed-in");
  }, []);

  // Restore a stored token
  useEffect(() => {
    const stored = localStorage.getItem(TOKEN_STORAGE_KEY);
    if (!stored) {
      setStatus("signed-out");
      return;
    }
    adopt(stored).catch(() => logout());
  }, [adopt, logout]);

  const login = useCallback(
    async (email: string, password: string) => {
      const { accessToken } = await requestToken(email, password);
      await adopt(accessToken);
    },
    [adopt]
  );

  return { token, user, status, login, logout };
}
