import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "Tableau de bord des championnats",
  description: "Classements, calendriers et comparaisons des 5 grands championnats de football",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="fr">
      <body className="antialiased bg-[#0A1F1C] text-[#F9FAFB]">
        {children}
      </body>
    </html>
  );
}
