import { BadgeCheck, Twitter } from "lucide-react";
import type { EstimatedField, TwitterProfile } from "../types/analysis";
import { formatCount, formatPercent } from "../utils/format";
import GrowthChart from "./visualizations/GrowthChart";

interface TwitterPanelProps {
  profile: TwitterProfile | null;
  handle: string | null;
}

function Metric({
  label,
  value,
  estimated = false,
}: {
  label: string;
  value: string;
  estimated?: boolean;
}) {
  return (
    <div className="bg-gray-50 rounded-lg p-3">
      <p className="text-xs text-gray-500">
        {label}
        {estimated && <span title="Estimated"> *</span>}
      </p>
      <p className="text-lg font-semibold text-gray-900">{value}</p>
    </div>
  );
}

export default function TwitterPanel({ profile, handle }: TwitterPanelProps) {
  if (!profile) {
    return (
      <div className="card">
        <h3 className="text-lg font-semibold text-gray-900 mb-2 flex items-center">
          <Twitter className="h-5 w-5 mr-2 text-sky-500" />
          Twitter
        </h3>
        <p className="text-sm text-gray-500">
          {handle ? `No Twitter data for @${handle}.` : "No Twitter handle is known for this person."}
        </p>
      </div>
    );
  }

  const estimated = (field: EstimatedField) => profile.estimatedFields.includes(field);

  return (
    <div className="card">
      <div className="flex items-center justify-between mb-4">
        <h3 className="text-lg font-semibold text-gray-900 flex items-center">
          <Twitter className="h-5 w-5 mr-2 text-sky-500" />
          {profile.name}
          <span className="ml-2 text-sm font-normal text-gray-500">@{profile.username}</span>
          {profile.verified && <BadgeCheck className="h-4 w-4 ml-1 text-sky-500" />}
        </h3>
        <span className="px-2 py-1 rounded-full text-xs font-medium bg-purple-100 text-purple-800">
          {profile.category}
        </span>
      </div>

      {profile.source === "synthetic" && (
        <div className="mb-4 rounded-md bg-yellow-50 border border-yellow-200 p-3 text-sm text-yellow-800">
          The Twitter API was unavailable. These numbers are placeholders and do not count toward
          the score.
        </div>
      )}

      <div className="grid grid-cols-2 md:grid-cols-4 gap-3 mb-4">
        <Metric label="Followers" value={formatCount(profile.followers)} />
        <Metric label="Following" value={formatCount(profile.following)} />
        <Metric
          label="Engagement"
          value={formatPercent(profile.engagementRate)}
          estimated={estimated("engagementRate")}
        />
        <Metric
          label="Content Quality"
          value={`${profile.contentQuality.toFixed(1)}/10`}
          estimated={estimated("contentQuality")}
        />
        <Metric label="Years Active" value={profile.yearsActive.toFixed(1)} />
        <Metric label="Sentiment" value={profile.sentiment.toFixed(2)} />
        <div className="col-span-2 bg-gray-50 rounded-lg p-3">
          <p className="text-xs text-gray-500">Posting Frequency</p>
          <p className="text-sm font-semibold text-gray-900">{profile.postingFrequency}</p>
        </div>
      </div>

      <div className="mb-4">
        <p className="text-xs uppercase tracking-wide text-gray-500 mb-2">Top Topics</p>
        <div className="flex flex-wrap gap-2">
          {profile.topics.map((topic) => (
            <span
              key={topic}
              className="px-2 py-1 rounded-full text-xs font-medium bg-sky-100 text-sky-800"
            >
              {topic}
            </span>
          ))}
        </div>
      </div>

      <div>
        <p className="text-xs uppercase tracking-wide text-gray-500 mb-2">
          Follower Growth{estimated("monthlyGrowth") && " *"}
        </p>
        <GrowthChart data={profile.monthlyGrowth} />
      </div>

      {profile.estimatedFields.length > 0 && (
        <p className="text-xs text-gray-400 mt-2">* estimated, not measured</p>
      )}
    </div>
  );
}
