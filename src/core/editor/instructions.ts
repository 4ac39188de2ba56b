export const INSTRUCTIONS: readonly string[] = [
  "Enter Line# Day(s) Hour(s) Minute and File Name or Strike.",
  "Separate line# and event parameters with a single space.",
  "Day is mm/dd/yy, su, mo, tu, we, th, fr, or sa.",
  "Hour is 24-hour time between 0 and 23.",
  "Minute is between 0 and 59. Events play at hh:mm:00.",
  "Ranges are allowed and inclusive: 0-23 = hourly, su-sa = daily.",
  "Ranges cannot wrap: use fr-sa and su-mo rather than fr-mo.",
  "Tunes are file names and are cAsE SeNsiTiVe.",
  "Line#<enter> to delete a line.",
  "<enter> to show the schedule, ?<enter> to repeat these instructions.",
];
