"use client";

import { useEffect, useMemo, useState } from "react";
import { Coffee, SearchX } from "lucide-react";
import { toast } from "sonner";
import { Button } from "@/components/ui/button";
import { EmptyState } from "@/components/ui/empty-state";
import { CafeCard } from "@/components/cafes/CafeCard";
import { CafeDetailDialog } from "@/components/cafes/CafeDetailDialog";
import { CafeFilters } from "@/components/cafes/CafeFilters";
import { fetchCafes, fetchCategories } from "@/lib/api-client";
import { filterCafes, hasActiveFilters, listCities } from "@/lib/cafes/filter";
import type { CafeFilters as Filters, CafeResponse } from "@/types/cafe";

/**
 * Public cafe listing. Loads every cafe once and filters in the browser.
 */
export function CafeBrowser() {
  const [cafes, setCafes] = useState<CafeResponse[]>([]);
  const [categories, setCategories] = useState<string[]>([]);
  const [filters, setFilters] = useState<Filters>({});
  const [selected, setSelected] = useState<CafeResponse | null>(null);
  const [loading, setLoading] = useState(true);

  useEffect(() => {
    Promise.all([fetchCafes(), fetchCategories()])
      .then(([cafeList, categoryList]) => {
        setCafes(cafeList);
        setCategories(categoryList.map((category) => category.name));
      })
      .catch((error: unknown) => {
        console.error("Failed to load cafes:", error);
        toast.error("Could not load cafés");
      })
      .finally(() => setLoading(false));
  }, []);

  const cities = useMemo(() => listCities(cafes), [cafes]);
  const visible = useMemo(() => filterCafes(cafes, filters, { cityMatch: "exact" }), [cafes, filters]);

  const resetFilters = () => setFilters({});

  return (
    <div className="mx-auto max-w-7xl px-6 py-10">
      <header className="mb-8 flex items-center gap-3">
        <div className="rounded-lg bg-primary/10 p-2.5">
          <Coffee className="h-6 w-6 text-primary" />
        </div>
        <div>
          <h1 className="text-3xl font-bold text-text-primary">Cafés</h1>
          <p className="text-text-secondary">Find the right spot for what you have in mind.</p>
        </div>
      </header>

      <div className="grid grid-cols-1 gap-8 md:grid-cols-[240px_1fr]">
        <CafeFilters
          cities={cities}
          categories={categories}
          filters={filters}
          onChange={setFilters}
          onReset={resetFilters}
        />

        <main>
          <p className="mb-4 text-sm text-text-tertiary" role="status">
            {loading ? "Loading cafés…" : `Showing ${visible.length} of ${cafes.length} cafés`}
          </p>

          {!loading && visible.length === 0 ? (
            <EmptyState
              icon={SearchX}
              title="No cafés match these filters"
              description="Try another city or fewer categories."
              action={
                hasActiveFilters(filters) && (
                  <Button variant="secondary" size="sm" onClick={resetFilters}>
                    Reset filters
                  </Button>
                )
              }
            />
          ) : (
            <div className="grid grid-cols-1 gap-4 sm:grid-cols-2 xl:grid-cols-3">
              {visible.map((cafe) => (
                <CafeCard key={cafe.id} cafe={cafe} onSelect={setSelected} />
              ))}
            </div>
          )}
        </main>
      </div>

      <CafeDetailDialog cafe={selected} onClose={() => setSelected(null)} onSelect={setSelected} />
    </div>
  );
}
