"use client";

import { useEffect, useState, type FormEvent, type ReactNode } from "react";
import { Button } from "@/components/ui/button";
import { Checkbox } from "@/components/ui/checkbox";
import {
  Dialog,
  DialogContent,
  DialogFooter,
  DialogHeader,
  DialogTitle,
} from "@/components/ui/dialog";
import { Input, Textarea } from "@/components/ui/input";
import { Select } from "@/components/ui/select";
import type { CafePayload } from "@/lib/api-client";
import type { CafeResponse } from "@/types/cafe";

export interface CafeFormDialogProps {
  open: boolean;
  /** Cafe being edited; null when adding */
  cafe: CafeResponse | null;
  categories: string[];
  onOpenChange: (open: boolean) => void;
  onSubmit: (payload: CafePayload) => Promise<void>;
}

const EMPTY_FORM: CafePayload = {
  name: "",
  city: "",
  address: "",
  openingHours: "",
  description: "",
  imageUrl: "",
  bestFor: "",
  alsoGoodFor: [],
};

export function toCafePayload(cafe: CafeResponse | null): CafePayload {
  if (!cafe) return EMPTY_FORM;
  return {
    name: cafe.name,
    city: cafe.city,
    address: cafe.address ?? "",
    openingHours: cafe.openingHours ?? "",
    description: cafe.description,
    imageUrl: cafe.imageUrl ?? "",
    bestFor: cafe.bestFor ?? "",
    alsoGoodFor: cafe.alsoGoodFor,
  };
}

export function CafeFormDialog({ open, cafe, categories, onOpenChange, onSubmit }: CafeFormDialogProps) {
  const [form, setForm] = useState<CafePayload>(EMPTY_FORM);
  const [submitting, setSubmitting] = useState(false);

  useEffect(() => {
    if (open) setForm(toCafePayload(cafe));
  }, [open, cafe]);

  const setField = <K extends keyof CafePayload>(field: K, value: CafePayload[K]) => {
    setForm((current) => ({ ...current, [field]: value }));
  };

  const setBestFor = (bestFor: string) => {
    setForm((current) => ({
      ...current,
      bestFor,
      alsoGoodFor: current.alsoGoodFor.filter((name) => name !== bestFor),
    }));
  };

  const toggleAlsoGoodFor = (name: string, checked: boolean) => {
    setForm((current) => ({
      ...current,
      alsoGoodFor: checked
        ? [...current.alsoGoodFor, name]
        : current.alsoGoodFor.filter((value) => value !== name),
    }));
  };

  const handleSubmit = async (e: FormEvent<HTMLFormElement>) => {
    e.preventDefault();
    setSubmitting(true);
    try {
      await onSubmit(form);
    } finally {
      setSubmitting(false);
    }
  };

  return (
    <Dialog open={open} onOpenChange={onOpenChange}>
      <DialogContent className="max-w-2xl max-h-[90vh] overflow-y-auto">
        <DialogHeader>
          <DialogTitle>{cafe ? `Edit ${cafe.name}` : "Add café"}</DialogTitle>
        </DialogHeader>

        <form onSubmit={handleSubmit} className="space-y-4">
          <div className="grid grid-cols-1 gap-4 sm:grid-cols-2">
            <Field label="Name" htmlFor="cafe-name">
              <Input
                id="cafe-name"
                required
                maxLength={255}
                value={form.name}
                onChange={(e) => setField("name", e.target.value)}
              />
            </Field>
            <Field label="City" htmlFor="cafe-city">
              <Input
                id="cafe-city"
                required
                maxLength={100}
                value={form.city}
                onChange={(e) => setField("city", e.target.value)}
              />
            </Field>
            <Field label="Address" htmlFor="cafe-address">
              <Input
                id="cafe-address"
                maxLength={255}
                value={form.address}
                onChange={(e) => setField("address", e.target.value)}
              />
            </Field>
            <Field label="Opening hours" htmlFor="cafe-opening-hours">
              <Input
                id="cafe-opening-hours"
                maxLength={100}
                placeholder="Mon-Fri 8:00-18:00"
                value={form.openingHours}
                onChange={(e) => setField("openingHours", e.target.value)}
              />
            </Field>
          </div>

          <Field label="Description" htmlFor="cafe-description">
            <Textarea
              id="cafe-description"
              required
              rows={4}
              value={form.description}
              onChange={(e) => setField("description", e.target.value)}
            />
          </Field>

          <Field label="Image URL" htmlFor="cafe-image-url">
            <Input
              id="cafe-image-url"
              type="url"
              maxLength={500}
              value={form.imageUrl}
              onChange={(e) => setField("imageUrl", e.target.value)}
            />
          </Field>

          <Field label="Best for" htmlFor="cafe-best-for">
            <Select
              id="cafe-best-for"
              required
              value={form.bestFor}
              onChange={(e) => setBestFor(e.target.value)}
            >
              <option value="" disabled>
                Choose a category
              </option>
              {categories.map((name) => (
                <option key={name} value={name}>
                  {name}
                </option>
              ))}
            </Select>
          </Field>

          <fieldset className="space-y-2">
            <legend className="mb-2 text-sm text-text-secondary">Also good for</legend>
            <div className="grid grid-cols-2 gap-2">
              {categories
                .filter((name) => name !== form.bestFor)
                .map((name) => (
                  <Checkbox
                    key={name}
                    label={name}
                    checked={form.alsoGoodFor.includes(name)}
                    onChange={(e) => toggleAlsoGoodFor(name, e.target.checked)}
                  />
                ))}
            </div>
          </fieldset>

          <DialogFooter>
            <Button type="button" variant="ghost" onClick={() => onOpenChange(false)}>
              Cancel
            </Button>
            <Button type="submit" loading={submitting}>
              {cafe ? "Save changes" : "Add café"}
            </Button>
          </DialogFooter>
        </form>
      </DialogContent>
    </Dialog>
  );
}

function Field({
  label,
  htmlFor,
  children,
}: {
  label: string;
  htmlFor: string;
  children: ReactNode;
}) {
  return (
    <div className="space-y-1.5">
      <label htmlFor={htmlFor} className="text-sm text-text-secondary">
        {label}
      </label>
      {children}
    </div>
  );
}
