import type { Meta, StoryObj } from "@storybook/react";
import { FanDial } from "./FanDial";
import { createStringLookup } from "./strings";

const meta = {
  title: "Features/FanDial",
  component: FanDial,
  tags: ["autodocs"],
} satisfies Meta<typeof FanDial>;

export default meta;
type Story = StoryObj<typeof meta>;

export const Default: Story = {
  args: {
    colors: { low: "#FFEB3B", medium: "#CDDC39", high: "#009688" },
  },
};

export const Small: Story = {
  args: {
    colors: { low: "#FFEB3B", medium: "#CDDC39", high: "#009688" },
    width: 160,
    height: 160,
  },
};

export const ArgbColors: Story = {
  args: {
    colors: { low: 0xffff0000, medium: 0xffffff00, high: 0xff00ff00 },
  },
};

export const MissingColors: Story = {
  args: {},
};

export const CustomLabels: Story = {
  args: {
    colors: { low: "#FFEB3B", medium: "#CDDC39", high: "#009688" },
    lookup: createStringLookup({ fan_off: "Off", fan_low: "Lo", fan_medium: "Med", fan_high: "Hi" }),
  },
};
