import { describe, it, expect } from "vitest";
import { render, screen } from "@testing-library/react";
import { PointsBarChart } from "../PointsBarChart";
import { STANDINGS } from "@/lib/__tests__/sample-data";

describe("PointsBarChart", () => {
  it("dessine une barre par équipe, la plus haute pour le max de points", () => {
    const { container } = render(<PointsBarChart rows={STANDINGS} />);
    const bars = Array.from(container.querySelectorAll("rect[data-team]"));
    expect(bars.map((b) => b.getAttribute("data-team"))).toEqual([
      "Rivermouth",
      "Hillcrest United",
      "Oakfield Town",
      "Portside Athletic",
    ]);
    expect(bars[0].getAttribute("height")).toBe("240");
    expect(bars[0].getAttribute("y")).toBe("20");
  });

  it("incline les noms d'équipe à -45°", () => {
    render(<PointsBarChart rows={STANDINGS} />);
    const label = screen.getByText("Oakfield Town", { selector: "text" });
    expect(label.getAttribute("transform")).toMatch(/^rotate\(-45 /);
  });

  it("titre personnalisable", () => {
    render(<PointsBarChart rows={[]} title="Points" />);
    expect(screen.getByRole("img", { name: "Points" })).toBeInTheDocument();
  });
});
