"use client";

interface EmptyStateProps {
  icon: string;
  title: string;
  description?: string;
  /** Bouton "Réessayer" affiché si fourni */
  onRetry?: () => void;
}

export function EmptyState({ icon, title, description, onRetry }: EmptyStateProps) {
  return (
    <div className="flex flex-col items-center justify-center rounded-xl border border-[#1F4641] bg-[#0F2F2B]/50 px-6 py-12 text-center">
      <span className="mb-4 text-5xl" role="img" aria-hidden>
        {icon}
      </span>
      <h3 className="text-lg font-semibold text-[#F9FAFB]">{title}</h3>
      {description && <p className="mt-2 max-w-sm text-sm text-[#9CA3AF]">{description}</p>}
      {onRetry && (
        <button
          type="button"
          onClick={onRetry}
          className="mt-6 rounded-lg bg-[#1F4641] px-4 py-2.5 text-sm font-medium text-[#F9FAFB] transition hover:bg-[#2a5a52]"
        >
          Réessayer
        </button>
      )}
    </div>
  );
}
