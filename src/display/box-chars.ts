export interface BoxChars {
  horizontal: string;
  vertical: string;
  topLeft: string;
  topRight: string;
  bottomLeft: string;
  bottomRight: string;
  topJoin: string;
  bottomJoin: string;
  leftJoin: string;
  rightJoin: string;
  cross: string;
}

export const UNICODE_BOX: BoxChars = {
  horizontal: "─",
  vertical: "│",
  topLeft: "┌",
  topRight: "┐",
  bottomLeft: "└",
  bottomRight: "┘",
  topJoin: "┬",
  bottomJoin: "┴",
  leftJoin: "├",
  rightJoin: "┤",
  cross: "┼",
};

export type RulePosition = "top" | "middle" | "bottom";

export function ruleChars(box: BoxChars, position: RulePosition): { left: string; join: string; right: string } {
  switch (position) {
    case "top":
      return { left: box.topLeft, join: box.topJoin, right: box.topRight };
    case "bottom":
      return { left: box.bottomLeft, join: box.bottomJoin, right: box.bottomRight };
    case "middle":
      return { left: box.leftJoin, join: box.cross, right: box.rightJoin };
  }
}
