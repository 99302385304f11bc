import { Briefcase, Calendar, DollarSign, Heart, User } from "lucide-react";
import type { PersonAnalysis } from "../types/analysis";
import { isUnknown } from "../utils/format";

interface PersonOverviewProps {
  analysis: PersonAnalysis;
}

function Fact({ icon, label, value }: { icon: React.ReactNode; label: string; value: string }) {
  return (
    <div className="flex items-start space-x-3">
      <div className="text-gray-400 mt-0.5">{icon}</div>
      <div>
        <p className="text-xs uppercase tracking-wide text-gray-500">{label}</p>
        <p className="text-sm font-medium text-gray-900">{isUnknown(value) ? "Unknown" : value}</p>
      </div>
    </div>
  );
}

export default function PersonOverview({ analysis }: PersonOverviewProps) {
  const { details } = analysis;

  return (
    <div className="card">
      <div className="flex flex-col sm:flex-row gap-6">
        {analysis.imageUrl ? (
          <img
            src={analysis.imageUrl}
            alt={analysis.name}
            className="h-40 w-32 object-cover rounded-lg shadow-sm"
          />
        ) : (
          <div className="h-40 w-32 rounded-lg bg-gray-100 flex items-center justify-center">
            <User className="h-12 w-12 text-gray-300" />
          </div>
        )}

        <div className="flex-1">
          <h2 className="text-2xl font-bold text-gray-900 mb-4">
            {details && !isUnknown(details.name) ? details.name : analysis.name}
          </h2>

          {details ? (
            <>
              <div className="grid grid-cols-1 md:grid-cols-2 gap-4 mb-4">
                <Fact icon={<Calendar className="h-4 w-4" />} label="Born" value={details.dob} />
                <Fact icon={<User className="h-4 w-4" />} label="Age" value={details.age} />
                <Fact
                  icon={<DollarSign className="h-4 w-4" />}
                  label="Net Worth"
                  value={details.netWorth}
                />
                <Fact icon={<Heart className="h-4 w-4" />} label="Charity" value={details.charity} />
              </div>

              <div>
                <p className="text-xs uppercase tracking-wide text-gray-500 mb-2 flex items-center">
                  <Briefcase className="h-3 w-3 mr-1" />
                  Companies
                </p>
                {details.companies.length > 0 ? (
                  <div className="flex flex-wrap gap-2">
                    {details.companies.map((company) => (
                      <span
                        key={company}
                        className="px-2 py-1 rounded-full text-xs font-medium bg-blue-100 text-blue-800"
                      >
                        {company}
                      </span>
                    ))}
                  </div>
                ) : (
                  <p className="text-sm text-gray-500">None listed</p>
                )}
              </div>
            </>
          ) : (
            <p className="text-sm text-gray-500">Biographical details are unavailable.</p>
          )}
        </div>
      </div>
    </div>
  );
}
