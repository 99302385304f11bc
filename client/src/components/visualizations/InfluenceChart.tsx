import {
  Bar,
  BarChart,
  CartesianGrid,
  Legend,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from "recharts";
import type { InfluenceResult } from "../../types/analysis";
import { COMPONENT_LABELS, COMPONENT_ORDER } from "../../utils/format";

interface InfluenceChartProps {
  influence: InfluenceResult;
}

export default function InfluenceChart({ influence }: InfluenceChartProps) {
  const chartData = COMPONENT_ORDER.map((component) => ({
    name: COMPONENT_LABELS[component],
    points: Math.round(influence.components[component] * 10) / 10,
    max: influence.weights[component],
  }));

  return (
    <ResponsiveContainer width="100%" height={260}>
      <BarChart data={chartData} margin={{ top: 10, right: 20, left: 0, bottom: 0 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#e5e7eb" />
        <XAxis dataKey="name" tick={{ fontSize: 11 }} />
        <YAxis tick={{ fontSize: 12 }} width={30} />
        <Tooltip contentStyle={{ fontSize: 12 }} />
        <Legend wrapperStyle={{ fontSize: 12 }} />
        <Bar dataKey="points" name="Points" fill="#2563eb" radius={[4, 4, 0, 0]} />
        <Bar dataKey="max" name="Maximum" fill="#cbd5e1" radius={[4, 4, 0, 0]} />
      </BarChart>
    </ResponsiveContainer>
  );
}
