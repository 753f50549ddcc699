export interface CompressedPersonal {
  name: string;
  email: string;
  location: string;
  linkedin: string;
}

export interface CompressedExperience {
  company: string;
  title: string;
  start_date: string;
  end_date: string;
  technologies: string;
  description: string;
}

export interface CompressedSalary {
  preferred_rate: number;
  minimum_rate: number;
  currency: string;
  availability: number;
}

export interface CompressedDocument {
  personal: CompressedPersonal;
  experience: CompressedExperience[];
  total_experience_years: number;
  salary: CompressedSalary;
}

/** Sections read back from a stored document; a key left out of the JSON stays undefined. */
export interface CompressedSections {
  personal?: CompressedPersonal;
  experience?: CompressedExperience[];
  salary?: CompressedSalary;
}
