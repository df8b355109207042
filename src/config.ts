export const DEFAULTS = {
  // Block labels
  labels: {
    primary: "primary_keywords",
    secondary: "secondary_keywords"
  },

  // Block layout
  open: "vec![",
  close: "],",
  indent: "\t",
  entrySuffix: ".to_string(),",

  // Input
  encoding: "utf-8",

  doneMessage: "You can now add the keywords to the src/filetype.rs folder."
} as const;
