export {
  devCommunityNames,
  generatedHashtags,
  mediumTopics,
  quoraTopics,
  redditCommunityNames
} from './community-names';
