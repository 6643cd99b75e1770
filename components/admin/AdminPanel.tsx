"use client";

import { useCallback, useEffect, useState } from "react";
import Link from "next/link";
import { LogOut, Pencil, Plus, Trash2 } from "lucide-react";
import { toast } from "sonner";
import { Badge } from "@/components/ui/badge";
import { Button } from "@/components/ui/button";
import { EmptyState } from "@/components/ui/empty-state";
import { CafeFormDialog } from "@/components/admin/CafeFormDialog";
import { DeleteCafeDialog } from "@/components/admin/DeleteCafeDialog";
import { LoginForm } from "@/components/admin/LoginForm";
import { useAdminSession } from "@/hooks/useAdminSession";
import {
  ApiClientError,
  createCafe,
  deleteCafe,
  fetchCafes,
  fetchCategories,
  updateCafe,
  type CafePayload,
} from "@/lib/api-client";
import type { CafeResponse } from "@/types/cafe";

type FormState = { open: false } | { open: true; cafe: CafeResponse | null };

/**
 * Error message for a toast, with the first validation issue appended
 */
export function describeError(error: unknown): string {
  if (error instanceof ApiClientError && Array.isArray(error.details)) {
    const first: unknown = error.details[0];
    if (typeof first === "object" && first !== null && "message" in first && typeof first.message === "string") {
      return `${error.message}: ${first.message}`;
    }
  }
  return error instanceof Error ? error.message : "Something went wrong";
}

export function AdminPanel() {
  const { token, user, status, login, logout } = useAdminSession();
  const [cafes, setCafes] = useState<CafeResponse[]>([]);
  const [categories, setCategories] = useState<string[]>([]);
  const [formState, setFormState] = useState<FormState>({ open: false });
  const [pendingDelete, setPendingDelete] = useState<CafeResponse | null>(null);

  const reportError = useCallback(
    (error: unknown) => {
      if (error instanceof ApiClientError && error.status === 401) {
        toast.error("Session expired, please sign in again");
        logout();
        return;
      }
      toast.error(describeError(error));
    },
    [logout]
  );

  const reload = useCallback(async () => {
    const [cafeList, categoryList] = await Promise.all([fetchCafes(), fetchCategories()]);
    setCafes(cafeList);
    setCategories(categoryList.map((category) => category.name));
  }, []);

  useEffect(() => {
    if (status === "signed-in") {
      reload().catch(reportError);
    }
  }, [status, reload, reportError]);

  if (status === "loading") {
    return <p className="p-6 text-sm text-text-muted">Loading…</p>;
  }

  if (status === "signed-out" || !token) {
    return <LoginForm onLogin={login} />;
  }

  const handleSubmit = async (payload: CafePayload) => {
    if (!formState.open) return;
    const editing = formState.cafe;
    try {
      const saved = editing
        ? await updateCafe(token, editing.id, payload)
        : await createCafe(token, payload);
      toast.success(editing ? `Saved ${saved.name}` : `Added ${saved.name}`);
      setFormState({ open: false });
      await reload();
    } catch (error) {
      reportError(error);
    }
  };

  const handleDelete = async (cafe: CafeResponse) => {
    try {
      await deleteCafe(token, cafe.id);
      toast.success(`Deleted ${cafe.name}`);
      setPendingDelete(null);
      await reload();
    } catch (error) {
      reportError(error);
    }
  };

  return (
    <div className="mx-auto max-w-7xl p-6">
      <div className="mb-8 flex items-center justify-between">
        <div>
          <h1 className="text-3xl font-bold text-text-primary">Manage cafés</h1>
          <p className="text-sm text-text-secondary">
            Signed in as {user?.email}.{" "}
            <Link href="/" className="text-primary hover:underline">
              View public page
            </Link>
          </p>
        </div>
        <div className="flex gap-2">
          <Button onClick={() => setFormState({ open: true, cafe: null })}>
            <Plus className="h-4 w-4" />
            Add café
          </Button>
          <Button variant="ghost" onClick={logout}>
            <LogOut className="h-4 w-4" />
            Sign out
          </Button>
        </div>
      </div>

      {cafes.length === 0 ? (
        <EmptyState title="No cafés yet" description="Add the first one to get started." />
      ) : (
        <div className="overflow-x-auto rounded-lg border border-border">
          <table className="w-full text-sm">
            <thead className="bg-background-secondary text-left text-text-tertiary">
              <tr>
                <th className="px-4 py-3 font-medium">Name</th>
                <th className="px-4 py-3 font-medium">City</th>
                <th className="px-4 py-3 font-medium">Best for</th>
                <th className="px-4 py-3 font-medium">Also good for</th>
                <th className="px-4 py-3" />
              </tr>
            </thead>
            <tbody>
              {cafes.map((cafe) => (
                <tr key={cafe.id} className="border-t border-border hover:bg-background-secondary">
                  <td className="px-4 py-3 font-medium text-text-primary">{cafe.name}</td>
                  <td className="px-4 py-3 text-text-secondary">{cafe.city}</td>
                  <td className="px-4 py-3">
                    {cafe.bestFor && <Badge variant="primary">{cafe.bestFor}</Badge>}
                  </td>
                  <td className="px-4 py-3">
                    <div className="flex flex-wrap gap-1">
                      {cafe.alsoGoodFor.map((name) => (
                        <Badge key={name}>{name}</Badge>
                      ))}
                    </div>
                  </td>
                  <td className="px-4 py-3">
                    <div className="flex justify-end gap-1">
                      <Button
                        variant="ghost"
                        size="icon"
                        aria-label={`Edit ${cafe.name}`}
                        onClick={() => setFormState({ open: true, cafe })}
                      >
                        <Pencil className="h-4 w-4" />
                      </Button>
                      <Button
                        variant="ghost"
                        size="icon"
                        aria-label={`Delete ${cafe.name}`}
                        onClick={() => setPendingDelete(cafe)}
                      >
                        <Trash2 className="h-4 w-4 text-error" />
                      </Button>
                    </div>
                  </td>
                </tr>
              ))}
            </tbody>
          </table>
        </div>
      )}

      <CafeFormDialog
        open={formState.open}
        cafe={formState.open ? formState.cafe : null}
        categories={categories}
        onOpenChange={(open) => !open && setFormState({ open: false })}
        onSubmit={handleSubmit}
      />
      <DeleteCafeDialog
        cafe={pendingDelete}
        onCancel={() => setPendingDelete(null)}
        onConfirm={handleDelete}
      />
    </div>
  );
}
