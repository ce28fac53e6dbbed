"use client";

import type { ReactNode } from "react";

interface SectionHeaderProps {
  icon: string;
  title: string;
  /** id du titre, pour aria-labelledby de la section */
  id?: string;
  /** Nombre de lignes affichées */
  count?: number;
  /** Contrôles alignés à droite (sélecteurs, boutons) */
  children?: ReactNode;
}

export function SectionHeader({ icon, title, id, count, children }: SectionHeaderProps) {
  return (
    <div className="mb-4 flex flex-wrap items-center gap-3">
      <span className="text-2xl" role="img" aria-hidden>
        {icon}
      </span>
      <h2 id={id} className="text-lg font-bold tracking-tight text-[#F9FAFB]">
        {title}
      </h2>
      {count != null && count > 0 && (
        <span className="rounded-full bg-[#1F4641] px-2.5 py-0.5 text-sm text-[#9CA3AF]">
          {count}
        </span>
      )}
      {children && <div className="ml-auto flex flex-wrap items-center gap-2">{children}</div>}
    </div>
  );
}
