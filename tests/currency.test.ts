import { describe, it, expect } from "@jest/globals";
import { formatMoney, roundMoney } from "../src/economy/currency";
import { landedMessage, outcomeMessage } from "../src/ui/outcome";

describe("formatMoney", () => {
    const cases: Array<[number, string]> = [
        [0, "$0.00"],
        [1, "$1.00"],
        [12.5, "$12.50"],
        [100, "$100.00"],
        [1_234.5, "$1,234.50"],
        [1_000_000, "$1,000,000.00"],
        [-5, "-$5.00"],
        [-0.001, "$0.00"],
    ];
    for (const [v, out] of cases) it(`${v} -> ${out}`, () => expect(formatMoney(v)).toBe(out));
});

describe("roundMoney", () => {
    it("rounds to cents", () => {
        expect(roundMoney(0.1 + 0.2)).toBe(0.3);
        expect(roundMoney(2.499)).toBe(2.5);
        expect(roundMoney(-3.336)).toBe(-3.34);
    });
});

describe("outcome messages", () => {
    it("win and loss", () => {
        expect(outcomeMessage("win", 350)).toBe("You won $350.00!");
        expect(outcomeMessage("loss", -10)).toBe("You lost $10.00.");
    });

    it("end of session", () => {
        expect(outcomeMessage("cash_out", 120)).toBe("You leave the table with $120.00. Thanks for playing!");
        expect(outcomeMessage("broke", 0)).toBe("You leave the table with $0.00. Better luck next time!");
        expect(outcomeMessage("interrupted", 55.5)).toBe("Game aborted. You leave with $55.50. See you next time!");
    });

    it("landing", () => {
        expect(landedMessage({ value: 0, color: "green" })).toBe("The ball landed on 0 (green).");
    });
});
