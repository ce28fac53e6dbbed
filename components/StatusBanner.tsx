"use client";

export type BannerStatus = "success" | "error" | "info";

const config: Record<BannerStatus, { icon: string; className: string }> = {
  success: {
    icon: "✅",
    className: "border-emerald-500/40 bg-emerald-500/10 text-emerald-400",
  },
  error: {
    icon: "⚠️",
    className: "border-red-500/30 bg-red-500/10 text-red-400",
  },
  info: {
    icon: "ℹ️",
    className: "border-sky-500/30 bg-sky-500/10 text-sky-300",
  },
};

interface StatusBannerProps {
  status: BannerStatus;
  message: string;
}

export function StatusBanner({ status, message }: StatusBannerProps) {
  const { icon, className } = config[status];
  return (
    <div
      role={status === "error" ? "alert" : "status"}
      className={`flex items-center gap-2 rounded-xl border px-4 py-3 text-sm ${className}`}
    >
      <span aria-hidden>{icon}</span>
      <span>{message}</span>
    </div>
  );
}
