"use client";

import { RotateCcw } from "lucide-react";
import { Button } from "@/components/ui/button";
import { Checkbox } from "@/components/ui/checkbox";
import { Select } from "@/components/ui/select";
import type { CafeFilters as Filters } from "@/types/cafe";

export interface CafeFiltersProps {
  cities: string[];
  categories: string[];
  filters: Filters;
  onChange: (filters: Filters) => void;
  onReset: () => void;
}

export function CafeFilters({ cities, categories, filters, onChange, onReset }: CafeFiltersProps) {
  const alsoGoodFor = filters.alsoGoodFor ?? [];

  const toggleAlsoGoodFor = (name: string, checked: boolean) => {
    const next = checked ? [...alsoGoodFor, name] : alsoGoodFor.filter((value) => value !== name);
    onChange({ ...filters, alsoGoodFor: next.length > 0 ? next : undefined });
  };

  return (
    <aside className="space-y-6" aria-label="Filters">
      <div className="space-y-2">
        <label htmlFor="filter-city" className="text-sm font-medium text-text-secondary">
          City
        </label>
        <Select
          id="filter-city"
          value={filters.city ?? ""}
          onChange={(e) => onChange({ ...filters, city: e.target.value || undefined })}
        >
          <option value="">All cities</option>
          {cities.map((city) => (
            <option key={city} value={city}>
              {city}
            </option>
          ))}
        </Select>
      </div>

      <div className="space-y-2">
        <label htmlFor="filter-best-for" className="text-sm font-medium text-text-secondary">
          Best for
        </label>
        <Select
          id="filter-best-for"
          value={filters.bestFor ?? ""}
          onChange={(e) => onChange({ ...filters, bestFor: e.target.value || undefined })}
        >
          <option value="">Anything</option>
          {categories.map((name) => (
            <option key={name} value={name}>
              {name}
            </option>
          ))}
        </Select>
      </div>

      <fieldset className="space-y-2">
        <legend className="text-sm font-medium text-text-secondary mb-2">Also good for</legend>
        {categories.map((name) => (
          <Checkbox
            key={name}
            label={name}
            checked={alsoGoodFor.includes(name)}
            onChange={(e) => toggleAlsoGoodFor(name, e.target.checked)}
          />
        ))}
      </fieldset>

      <Button variant="outline" size="sm" className="w-full" onClick={onReset}>
        <RotateCcw className="h-3.5 w-3.5" />
        Reset filters
      </Button>
    </aside>
  );
}
