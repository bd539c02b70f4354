import { createElement, createStateRef, defineComposable, list, show, type Props } from "tessera";

export interface InventoryItem {
  id: string;
  name: string;
  quantity: number;
}

export const inventory = createStateRef<InventoryItem[]>("inventory");
export const bagOpen = createStateRef<boolean>("bagOpen");

const Slot = defineComposable("Slot", (props: { item: InventoryItem; index: number }, scope) => {
  const hovered = scope.useState("hovered", false);
  return createElement(
    "Node",
    { position: [props.index * 48, 0], highlighted: hovered.value },
    createElement("Text", { value: `${props.item.name} x${props.item.quantity}` }),
  );
});

const Bag = defineComposable("Bag", (_props: Props, scope) => {
  const items = scope.useStateRef(inventory, []).value;
  const total = scope.useMemo("total", () => items.reduce((sum, item) => sum + item.quantity, 0), [items]);

  return createElement(
    "Node",
    { layout: "row" },
    createElement("Text", { value: `${total} items` }),
    list(
      items,
      (item) => item.id,
      (item, index) => createElement(Slot, { item, index }),
    ),
  );
});

export const Hud = defineComposable("Hud", (_props: Props, scope) => {
  const open = scope.useStateRef(bagOpen, false).value;
  return createElement("Node", { anchor: "bottom" }, show(open, createElement(Bag, {}), createElement("Text", { value: "press I" })));
});
